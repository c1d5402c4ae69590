import { TokenAssetDto, TokenHistoryDto, TokenTransferDto } from './dto/token-history.dto';
import { TokenAsset } from './entities/token-asset.entity';
import { TokenTransfer } from './entities/token-transfer.entity';
import { TokenHistory } from '../ledger/ledger-snapshot-storage.service';

export function toTokenAsset(dto: TokenAssetDto): TokenAsset {
  return {
    ticker: dto.ticker,
    address: dto.address,
    balance: dto.balance,
    currentPrice: dto.currentPrice,
    currentValue: dto.currentValue,
    native: dto.native,
    decimals: dto.decimals,
  };
}

export function toTokenTransfer(dto: TokenTransferDto): TokenTransfer {
  return {
    txHash: dto.txHash,
    timestamp: new Date(dto.timestamp),
    transferType: dto.transferType,
    deltaRaw: dto.deltaRaw,
    deltaQuote: dto.deltaQuote ?? null,
    gasQuote: dto.gasQuote ?? null,
    decimals: dto.decimals,
  };
}

export function toTokenHistory(dto: TokenHistoryDto): TokenHistory {
  return {
    asset: toTokenAsset(dto.asset),
    transfers: dto.transfers.map(toTokenTransfer),
  };
}
