import {
  Column,
  DeepPartial,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { ProxyEntity } from '../../pool/entities/proxy.entity';

/** One reported outcome. Append-only, feeds windowed failure ratios */
@Entity({ name: 'proxy_reports' })
@Index(['proxyId', 'reportedAt'])
export class ProxyReportEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'proxy_id', type: 'int' })
  proxyId!: number;

  @ManyToOne(() => ProxyEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'proxy_id' })
  proxy?: ProxyEntity;

  @Column({ name: 'status_code', type: 'int' })
  statusCode!: number;

  @Column({ name: 'reported_at', type: 'timestamptz' })
  reportedAt!: Date;

  constructor(partial?: DeepPartial<ProxyReportEntity>) {
    if (partial) {
      Object.assign(this, partial);
    }
  }
}
