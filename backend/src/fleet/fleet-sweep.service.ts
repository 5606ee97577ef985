import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { AppConfig } from '../config/configuration';
import { FleetService } from './fleet.service';

export const FLEET_SWEEP_INTERVAL = 'fleet-sweep';

/**
 * Optional background eviction. Aggregate reads always evict first; this only
 * changes how soon a silent device disappears from the registry.
 */
@Injectable()
export class FleetSweepService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(FleetSweepService.name);
  private readonly intervalMs: number;

  constructor(
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly fleetService: FleetService,
    configService: ConfigService<AppConfig, true>,
  ) {
    this.intervalMs = configService.get('fleet', { infer: true }).sweepIntervalMs;
  }

  onModuleInit() {
    if (this.intervalMs <= 0) {
      return;
    }

    const interval = setInterval(() => this.sweep(), this.intervalMs);
    this.schedulerRegistry.addInterval(FLEET_SWEEP_INTERVAL, interval);
    this.logger.log(`Background eviction every ${this.intervalMs}ms`);
  }

  onModuleDestroy() {
    if (this.schedulerRegistry.doesExist('interval', FLEET_SWEEP_INTERVAL)) {
      this.schedulerRegistry.deleteInterval(FLEET_SWEEP_INTERVAL);
    }
  }

  sweep(): void {
    try {
      this.fleetService.evictStale();
    } catch (error) {
      this.logger.error('Background eviction failed', error);
    }
  }
}
