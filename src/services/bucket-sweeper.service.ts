import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { KeyAdmissionConfig } from '../interfaces/config.interface';
import { TokenBucketStore } from './token-bucket-store.service';
import {
  BUCKET_SWEEP_INTERVAL_NAME,
  KEY_ADMISSION_CONFIG,
} from '../utils/constants';

/**
 * Periodically evicts idle buckets so keys that stop calling do not stay in memory
 */
@Injectable()
export class BucketSweeperService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(BucketSweeperService.name);

  constructor(
    @Inject(KEY_ADMISSION_CONFIG) private readonly config: KeyAdmissionConfig,
    private readonly bucketStore: TokenBucketStore,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {}

  onModuleInit(): void {
    const intervalMs = this.config.sweepIntervalMs ?? 0;
    if (intervalMs <= 0) {
      return;
    }

    const handle = setInterval(() => this.sweep(), intervalMs);
    handle.unref();
    this.schedulerRegistry.addInterval(BUCKET_SWEEP_INTERVAL_NAME, handle);
    this.logger.log(`Sweeping idle buckets every ${intervalMs}ms`);
  }

  onModuleDestroy(): void {
    if (this.schedulerRegistry.doesExist('interval', BUCKET_SWEEP_INTERVAL_NAME)) {
      this.schedulerRegistry.deleteInterval(BUCKET_SWEEP_INTERVAL_NAME);
    }
  }

  /**
   * Run one eviction pass
   * @returns Number of evicted buckets
   */
  sweep(): number {
    const evicted = this.bucketStore.evictIdle();
    if (evicted > 0) {
      this.logger.log(
        `Evicted ${evicted} idle buckets, ${this.bucketStore.size} remaining`,
      );
    }
    return evicted;
  }
}
