import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../config/configuration';
import { CLOCK, Clock } from './clock';
import { DeviceCommand } from './types';

/**
 * Per-device FIFO of commands waiting for the next poll.
 *
 * Every method runs to completion without yielding to the event loop, so a
 * drain never observes half of an enqueue: a command lands in exactly one
 * drain result.
 */
@Injectable()
export class CommandQueueService {
  private readonly logger = new Logger(CommandQueueService.name);
  private queues: Map<string, DeviceCommand[]> = new Map();
  private sequence = 0;
  private readonly warnDepth: number;

  constructor(
    configService: ConfigService<AppConfig, true>,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    this.warnDepth = configService.get('fleet', { infer: true }).commandQueueWarnDepth;
  }

  enqueue(deviceId: string, action: string, parameters: Record<string, unknown> = {}): DeviceCommand {
    const now = this.clock.now();
    const command: DeviceCommand = {
      command_id: `${action}_${Math.floor(now.getTime() / 1000)}_${++this.sequence}`,
      action,
      parameters,
      timestamp: now.toISOString(),
    };

    const queue = this.queues.get(deviceId) ?? [];
    queue.push(command);
    this.queues.set(deviceId, queue);

    if (queue.length > this.warnDepth) {
      this.logger.warn(`Command queue for ${deviceId} holds ${queue.length} undelivered commands`);
    }
    return command;
  }

  /** Hands over everything queued for the device and forgets it. */
  drain(deviceId: string): DeviceCommand[] {
    const pending = this.queues.get(deviceId) ?? [];
    this.queues.set(deviceId, []);
    return pending;
  }

  broadcast(deviceIds: readonly string[], action: string, parameters: Record<string, unknown> = {}): string[] {
    const targets = [...deviceIds];
    for (const deviceId of targets) {
      this.enqueue(deviceId, action, { ...parameters });
    }
    return targets;
  }
}
