import { stripChannelPrefix, toGatewayMsisdn } from './phone-number';

describe('phone numbers', () => {
  describe('stripChannelPrefix', () => {
    it('should drop the channel prefix', () => {
      expect(stripChannelPrefix('whatsapp:+254712345678')).toBe('+254712345678');
      expect(stripChannelPrefix(' WhatsApp:+254712345678 ')).toBe('+254712345678');
    });

    it('should leave bare numbers alone', () => {
      expect(stripChannelPrefix('+254712345678')).toBe('+254712345678');
    });
  });

  describe('toGatewayMsisdn', () => {
    it('should drop the plus of an international number', () => {
      expect(toGatewayMsisdn('+254712345678', '254')).toBe('254712345678');
    });

    it('should replace a national leading zero with the country code', () => {
      expect(toGatewayMsisdn('0712345678', '254')).toBe('254712345678');
    });

    it('should pass any other shape through unchanged', () => {
      expect(toGatewayMsisdn('712345678', '254')).toBe('712345678');
      expect(toGatewayMsisdn('254712345678', '254')).toBe('254712345678');
      expect(toGatewayMsisdn('+15551234567', '254')).toBe('+15551234567');
    });
  });
});
