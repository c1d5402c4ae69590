export class LedgerSnapshotNotFoundError extends Error {
  constructor(
    public readonly wallet: string,
    public readonly chain: string,
  ) {
    super(`No ledger snapshot for wallet ${wallet} on ${chain}`);
    this.name = 'LedgerSnapshotNotFoundError';
  }
}
