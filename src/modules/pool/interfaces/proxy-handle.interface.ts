/** What a client gets back from `acquire` */
export interface ProxyHandle {
  readonly id: number;
  readonly address: string;
  readonly sourceId: number;
  readonly providerId: number | null;
  readonly priority: number;
  readonly usageCooldownSec: number;
  readonly assignedAt: Date;
}
