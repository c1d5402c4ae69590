// Raised for structurally broken transfer records. There is no fallback
// for these, so calculation stops.
export class InvalidTransferError extends Error {
  constructor(
    public readonly transferIndex: number,
    public readonly field: string,
    detail: string,
  ) {
    super(`Invalid transfer #${transferIndex + 1}: ${field} ${detail}`);
    this.name = 'InvalidTransferError';
  }
}
