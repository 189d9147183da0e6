// File overview:
// - Purpose: Optional periodic log of store size, enabled from the file config.
// - Reached from: Provider of `ItemsModule`; timer starts on module init and stops on shutdown.
import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { fileConfig } from '../config/file.config';
import { ItemStore } from './item.store';

@Injectable()
export class StoreStatsService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(StoreStatsService.name);
  private timer?: NodeJS.Timeout;

  constructor(
    private readonly store: ItemStore,
    @Inject(fileConfig.KEY) private readonly config: ConfigType<typeof fileConfig>,
  ) {}

  onModuleInit(): void {
    if (!this.config.periodic_store_log_enabled) return;
    const intervalSeconds = this.config.periodic_store_log_interval;
    this.logger.log(`Logging store statistics every ${intervalSeconds}s`);
    this.timer = setInterval(() => this.logStats(), intervalSeconds * 1000);
    // never keep the process alive just for statistics
    this.timer.unref();
  }

  onModuleDestroy(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  logStats(): void {
    this.logger.log(`store items: ${this.store.size}`);
  }
}
