import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { isString } from 'class-validator';
import { AppConfig } from '../config/configuration';
import { CLOCK, Clock } from './clock';
import { ActivityEntry, ActivityReport, NEVER } from './types';

@Injectable()
export class ActivityLogService {
  private logs: Map<string, ActivityEntry[]> = new Map();
  private readonly limit: number;
  private readonly previewLength: number;

  constructor(
    configService: ConfigService<AppConfig, true>,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    const fleet = configService.get('fleet', { infer: true });
    this.limit = fleet.activityLogLimit;
    this.previewLength = fleet.contentPreviewLength;
  }

  append(deviceId: string, report: ActivityReport): ActivityEntry {
    const entry: ActivityEntry = {
      timestamp: this.clock.now().toISOString(),
      action: report.action ?? 'unknown',
      success: report.success ?? false,
      details: report.details ?? '',
      content_preview: this.preview(report.content_preview),
    };

    const log = this.logs.get(deviceId) ?? [];
    // newest first; anything past the limit falls off the end
    this.logs.set(deviceId, [entry, ...log].slice(0, this.limit));
    return entry;
  }

  mostRecentTimestamp(deviceId: string): string {
    return this.logs.get(deviceId)?.[0]?.timestamp ?? NEVER;
  }

  snapshotAll(): Record<string, ActivityEntry[]> {
    const snapshot: Record<string, ActivityEntry[]> = {};
    for (const [deviceId, log] of this.logs.entries()) {
      snapshot[deviceId] = [...log];
    }
    return snapshot;
  }

  private preview(value: unknown): string {
    if (value === undefined || value === null) {
      return '';
    }
    const text = isString(value) ? value : String(value);
    // truncate by code point
    return Array.from(text).slice(0, this.previewLength).join('');
  }
}
