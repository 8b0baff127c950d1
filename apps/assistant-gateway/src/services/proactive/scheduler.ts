import { systemClock, type Clock } from '@session-governor/core';

import type { AppLogger } from '../../telemetry/logger';
import type { GatewayMetrics } from '../../telemetry/metrics';
import type { UserState, UserStateRepository } from '../memory';
import type { AssistantSessionRegistry } from '../session';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface FollowUpThresholds {
  /** Quiet time since the last state update before a follow-up is due. */
  followUpAfterMs: number;
  /** Minimum gap between two proactive messages to the same user. */
  minMessageGapMs: number;
}

export const DEFAULT_FOLLOW_UP_THRESHOLDS: FollowUpThresholds = {
  followUpAfterMs: DAY_MS,
  minMessageGapMs: DAY_MS,
};

export interface ProactiveSchedulerOptions extends Partial<FollowUpThresholds> {
  checkIntervalMs: number;
  clock?: Clock;
}

export interface ProactiveRunResult {
  checked: number;
  online: string[];
  offline: string[];
  failed: string[];
}

export function needsFollowUp(
  state: UserState,
  now: number,
  thresholds: FollowUpThresholds = DEFAULT_FOLLOW_UP_THRESHOLDS,
): boolean {
  if (!state.activePlan) {
    return false;
  }
  if (
    state.lastProactiveMessageAt !== undefined &&
    now - state.lastProactiveMessageAt < thresholds.minMessageGapMs
  ) {
    return false;
  }
  return state.lastUpdateAt === undefined || now - state.lastUpdateAt > thresholds.followUpAfterMs;
}

export function composeFollowUp(plan: string): string {
  return [
    `Hi! I noticed you have an active plan '${plan}'.`,
    'It has been a day since your last update.',
    "Whenever you're ready, let's pick it up again.",
  ].join('\n');
}

/**
 * Periodically looks for users whose active plan has gone quiet and sends
 * them a follow-up. Users with a live session get it through their agent;
 * for everyone else the message is logged for out-of-band delivery.
 */
export class ProactiveScheduler {
  private timer?: NodeJS.Timeout;
  private running = false;
  private readonly clock: Clock;
  private readonly thresholds: FollowUpThresholds;

  constructor(
    private readonly userState: UserStateRepository,
    private readonly registry: AssistantSessionRegistry,
    private readonly metrics: GatewayMetrics,
    private readonly logger: AppLogger,
    private readonly options: ProactiveSchedulerOptions,
  ) {
    this.clock = options.clock ?? systemClock;
    this.thresholds = {
      followUpAfterMs: options.followUpAfterMs ?? DEFAULT_FOLLOW_UP_THRESHOLDS.followUpAfterMs,
      minMessageGapMs: options.minMessageGapMs ?? DEFAULT_FOLLOW_UP_THRESHOLDS.minMessageGapMs,
    };
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.logger.info({ checkIntervalMs: this.options.checkIntervalMs }, 'Proactive scheduler started');
    this.timer = setInterval(() => {
      this.tick().catch((error: unknown) => {
        this.logger.error({ error }, 'Proactive scheduler run failed');
      });
    }, this.options.checkIntervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
      this.logger.info('Proactive scheduler stopped');
    }
  }

  async runOnce(): Promise<ProactiveRunResult> {
    const now = this.clock();
    const candidates = await this.userState.listWithActivePlan();
    const result: ProactiveRunResult = { checked: candidates.length, online: [], offline: [], failed: [] };

    for (const state of candidates) {
      if (!state.activePlan || !needsFollowUp(state, now, this.thresholds)) {
        continue;
      }

      const { userId } = state;
      const message = composeFollowUp(state.activePlan);
      const agent = this.registry.isActive(userId) ? this.registry.getAgent(userId) : undefined;

      try {
        if (agent) {
          await agent.deliver(message);
          result.online.push(userId);
          this.metrics.proactiveMessages.inc({ channel: 'online' });
          this.logger.info({ userId, plan: state.activePlan }, 'Proactive follow-up delivered');
        } else {
          result.offline.push(userId);
          this.metrics.proactiveMessages.inc({ channel: 'offline' });
          this.logger.info({ userId, plan: state.activePlan, message }, 'Proactive follow-up queued for offline user');
        }
        await this.userState.markProactiveMessage(userId, now);
      } catch (error) {
        result.failed.push(userId);
        this.logger.error({ userId, error }, 'Failed to send proactive follow-up');
      }
    }

    this.logger.debug({ ...result }, 'Proactive check finished');
    return result;
  }

  private async tick(): Promise<void> {
    if (this.running) {
      this.logger.warn('Previous proactive check still running, skipping');
      return;
    }
    this.running = true;
    try {
      await this.runOnce();
    } finally {
      this.running = false;
    }
  }
}
