import { Column, DeepPartial, Entity, PrimaryGeneratedColumn } from 'typeorm';

/** Upstream origin that supplies proxies, e.g. a scraped site or a feed */
@Entity({ name: 'sources' })
export class SourceEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'name', type: 'varchar', length: 50, unique: true })
  name!: string;

  constructor(partial?: DeepPartial<SourceEntity>) {
    if (partial) {
      Object.assign(this, partial);
    }
  }
}
