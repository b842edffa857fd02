import { Global, Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { DialogueErrorsFilter } from './dialogue-errors.filter';
import { InMemoryStoreService } from './in-memory-store.service';

@Global()
@Module({
  providers: [InMemoryStoreService, { provide: APP_FILTER, useClass: DialogueErrorsFilter }],
  exports: [InMemoryStoreService],
})
export class CommonModule {}
