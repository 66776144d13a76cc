import {
  Column,
  DeepPartial,
  Entity,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Unique,
} from 'typeorm';
import { ProxyEntity } from '../../pool/entities/proxy.entity';
import { StatusOutcomeEntity } from './status-outcome.entity';

/** Running counter of one outcome kind for one proxy */
@Entity({ name: 'usage_statistics' })
@Unique(['proxyId', 'statusCode'])
export class UsageStatisticEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'proxy_id', type: 'int' })
  proxyId!: number;

  @ManyToOne(() => ProxyEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'proxy_id' })
  proxy?: ProxyEntity;

  @Column({ name: 'status_code', type: 'int' })
  statusCode!: number;

  @ManyToOne(() => StatusOutcomeEntity)
  @JoinColumn({ name: 'status_code' })
  status?: StatusOutcomeEntity;

  @Column({ name: 'counter', type: 'int', default: 0 })
  counter!: number;

  @Column({ name: 'last_reported_at', type: 'timestamptz' })
  lastReportedAt!: Date;

  constructor(partial?: DeepPartial<UsageStatisticEntity>) {
    if (partial) {
      Object.assign(this, partial);
    }
  }
}
