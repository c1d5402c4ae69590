export type PnlWarning =
  | {
      kind: 'no_transfer_history';
      message: string;
      balance: number;
    }
  | {
      kind: 'missing_buy_price';
      message: string;
      transferIndex: number;
      txHash: string;
      timestamp: string;
      fallbackPrice: number;
    }
  | {
      kind: 'sell_without_buy';
      message: string;
      transferIndex: number;
      txHash: string;
    }
  | {
      kind: 'missing_sell_price';
      message: string;
      transferIndex: number;
      txHash: string;
      fallbackPrice: number;
    }
  | {
      kind: 'unmatched_sell';
      message: string;
      transferIndex: number;
      txHash: string;
      unmatchedQty: number;
    }
  | {
      kind: 'balance_mismatch';
      message: string;
      queueBalance: number;
      actualBalance: number;
      difference: number;
      percentage: number;
    };
