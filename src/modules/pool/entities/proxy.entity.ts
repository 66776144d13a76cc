import {
  Column,
  DeepPartial,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { ProviderEntity } from './provider.entity';
import { SourceEntity } from './source.entity';

export const DEFAULT_USAGE_COOLDOWN_SEC = 30;

@Entity({ name: 'proxies' })
@Index(['sourceId', 'blocked', 'priority'])
@Index(['sourceId', 'lastTouched'])
export class ProxyEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  /** host:port, the same address may be listed under several sources */
  @Column({ name: 'address', type: 'varchar', length: 100 })
  address!: string;

  @Column({ name: 'source_id', type: 'int' })
  sourceId!: number;

  @ManyToOne(() => SourceEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'source_id' })
  source?: SourceEntity;

  @Column({ name: 'provider_id', type: 'int', nullable: true })
  providerId!: number | null;

  @ManyToOne(() => ProviderEntity, { onDelete: 'SET NULL', nullable: true })
  @JoinColumn({ name: 'provider_id' })
  provider?: ProviderEntity;

  /** Higher is preferred */
  @Column({ name: 'priority', type: 'int', default: 0 })
  priority!: number;

  @Column({ name: 'blocked', type: 'boolean', default: false })
  blocked!: boolean;

  /** Minimum gap between two assignments of this proxy */
  @Column({
    name: 'usage_cooldown_sec',
    type: 'int',
    default: DEFAULT_USAGE_COOLDOWN_SEC,
  })
  usageCooldownSec!: number;

  /** Last assignment or block-state change */
  @Column({ name: 'last_touched', type: 'timestamptz', default: () => 'now()' })
  lastTouched!: Date;

  constructor(partial?: DeepPartial<ProxyEntity>) {
    if (partial) {
      Object.assign(this, partial);
    }
  }
}
