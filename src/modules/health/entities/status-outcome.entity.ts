import { Column, Entity, PrimaryColumn } from 'typeorm';

/** Catalog of status codes a client may report. Seeded by migration */
@Entity({ name: 'status_outcomes' })
export class StatusOutcomeEntity {
  @PrimaryColumn({ name: 'code', type: 'int' })
  code!: number;

  @Column({ name: 'description', type: 'varchar', length: 300 })
  description!: string;
}
