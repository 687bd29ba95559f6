import type { Producer } from './interfaces';

/**
 * Serves a fixed list of records, whatever the requested date.
 */
export class StaticProducer<TRecord> implements Producer<TRecord> {
  constructor(
    public readonly id: string,
    private readonly records: readonly TRecord[],
    public readonly name: string = id
  ) {}

  async produce(): Promise<TRecord[]> {
    return [...this.records];
  }
}
