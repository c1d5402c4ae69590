import { Module } from '@nestjs/common';
import { LedgerSnapshotStorageService } from './ledger-snapshot-storage.service';
import { LEDGER_DATA_SOURCE } from './ledger-data-source.interface';

@Module({
  providers: [
    LedgerSnapshotStorageService,
    { provide: LEDGER_DATA_SOURCE, useExisting: LedgerSnapshotStorageService },
  ],
  exports: [LedgerSnapshotStorageService, LEDGER_DATA_SOURCE],
})
export class LedgerModule {}
