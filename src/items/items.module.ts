// File overview:
// - Purpose: Nest module bundling the in-memory item store, item use cases and public item routes.
// - Reached from: Imported by `AppModule`; `ItemsService` is exported for the admin routes.
import { Module } from '@nestjs/common';
import { ItemsController } from './items.controller';
import { ItemsService } from './items.service';
import { ItemStore } from './item.store';
import { StoreStatsService } from './store-stats.service';

@Module({
  controllers: [ItemsController],
  providers: [ItemStore, ItemsService, StoreStatsService],
  exports: [ItemsService],
})
export class ItemsModule {}
