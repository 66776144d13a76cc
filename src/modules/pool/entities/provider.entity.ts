import { Column, DeepPartial, Entity, PrimaryGeneratedColumn } from 'typeorm';

/** Vendor or operator a proxy is bought from */
@Entity({ name: 'providers' })
export class ProviderEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'name', type: 'varchar', length: 50, unique: true })
  name!: string;

  constructor(partial?: DeepPartial<ProviderEntity>) {
    if (partial) {
      Object.assign(this, partial);
    }
  }
}
