import { Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsDateString,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsNumberString,
  IsOptional,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';
import { TransferType } from '../entities/token-transfer.entity';

// Current holding as reported by the balance source.
export class TokenAssetDto {
  @IsString()
  @IsNotEmpty()
  ticker!: string;

  @IsString()
  address!: string;              // empty for native assets

  @IsNumber()
  @Min(0)
  balance!: number;

  @IsNumber()
  @Min(0)
  currentPrice!: number;

  @IsNumber()
  @Min(0)
  currentValue!: number;

  @IsBoolean()
  native!: boolean;

  @IsOptional()
  @IsInt()
  @Min(0)
  decimals?: number;
}

// A single ledger transfer. deltaRaw stays a string: raw amounts overflow JS numbers.
export class TokenTransferDto {
  @IsString()
  txHash!: string;

  @IsDateString()
  timestamp!: string;

  @IsEnum(TransferType)
  transferType!: TransferType;

  @IsNumberString({ no_symbols: false })
  deltaRaw!: string;

  @IsOptional()
  @IsNumber()
  deltaQuote?: number | null;

  @IsOptional()
  @IsNumber()
  @Min(0)
  gasQuote?: number | null;

  @IsInt()
  @Min(0)
  decimals!: number;
}

// One token with its full transfer history.
export class TokenHistoryDto {
  @ValidateNested()
  @Type(() => TokenAssetDto)
  asset!: TokenAssetDto;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => TokenTransferDto)
  transfers!: TokenTransferDto[];
}

// Full balance + history snapshot for one wallet on one chain.
export class LedgerSnapshotDto {
  @IsOptional()
  @IsDateString()
  updatedAt?: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => TokenHistoryDto)
  tokens!: TokenHistoryDto[];
}
