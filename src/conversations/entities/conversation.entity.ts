import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
} from 'typeorm';
import { decimalTransformer } from '../../common/decimal.transformer';

/**
 * A relay session between one customer and the feedback number.
 * The (customerNumber, feedbackNumber) pair is the natural key.
 */
@Entity('conversations')
@Index(['customerNumber', 'feedbackNumber'], { unique: true })
@Index(['feedbackNumber', 'active'])
export class Conversation {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'customer_number' })
  customerNumber!: string;

  @Column({ name: 'feedback_number' })
  feedbackNumber!: string;

  @Column({ name: 'last_activity_at', type: 'timestamptz' })
  lastActivityAt!: Date;

  @Column('numeric', {
    name: 'payment_amount',
    precision: 12,
    scale: 2,
    nullable: true,
    transformer: decimalTransformer,
  })
  paymentAmount!: number | null;

  @Column({ default: true })
  active!: boolean;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
