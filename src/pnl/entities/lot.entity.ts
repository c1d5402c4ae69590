import Decimal from 'decimal.js';

// Acquisition lot in the FIFO queue. Never mutated: partial consumption
// replaces the lot with a smaller one.
export interface Lot {
  readonly qty: Decimal;           // remaining unsold quantity
  readonly costPerUnit: Decimal;   // includes capitalized acquisition gas
  readonly gasUsd: Decimal;        // gas paid on acquisition
}
