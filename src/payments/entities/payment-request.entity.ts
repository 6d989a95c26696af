import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import { decimalTransformer } from '../../common/decimal.transformer';

export type PaymentRequestStatus = 'pending' | 'completed' | 'failed';

/**
 * One accepted STK push, kept so the asynchronous callback can be tied back
 * to the chat number that asked for it.
 */
@Entity('payment_requests')
@Index(['gatewayNumber', 'status'])
export class PaymentRequest {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index({ unique: true })
  @Column({ name: 'correlation_token' })
  correlationToken!: string;

  @Column({ name: 'merchant_request_id', type: 'varchar', nullable: true })
  merchantRequestId!: string | null;

  @Index()
  @Column({ name: 'checkout_request_id', type: 'varchar', nullable: true })
  checkoutRequestId!: string | null;

  @Column({ name: 'customer_number' })
  customerNumber!: string;

  @Column({ name: 'gateway_number' })
  gatewayNumber!: string;

  @Column('numeric', { precision: 12, scale: 2, transformer: decimalTransformer })
  amount!: number;

  @Column({ type: 'varchar', default: 'pending' })
  status!: PaymentRequestStatus;

  @Column({ name: 'receipt_number', type: 'varchar', nullable: true })
  receiptNumber!: string | null;

  @Column({ name: 'result_code', type: 'int', nullable: true })
  resultCode!: number | null;

  @Column({ name: 'result_desc', type: 'varchar', nullable: true })
  resultDesc!: string | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
