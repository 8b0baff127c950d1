import type { Clock, UserStateStore } from '@session-governor/core';

/** Long-lived facts about a user, rendered into the prompt as core memory. */
export interface UserState {
  userId: string;
  name?: string;
  bio?: string;
  health: string[];
  plans: string[];
  preferences: string[];
  /** Plan the user is currently following; drives proactive follow-ups. */
  activePlan?: string;
  lastUpdateAt?: number;
  lastProactiveMessageAt?: number;
}

export type UserStatePatch = Partial<Omit<UserState, 'userId' | 'lastUpdateAt' | 'lastProactiveMessageAt'>>;

/** User-state store extended with what the proactive scheduler needs. */
export interface UserStateRepository extends UserStateStore {
  getState(userId: string): Promise<UserState | undefined>;
  updateState(userId: string, patch: UserStatePatch): Promise<UserState>;
  listWithActivePlan(): Promise<UserState[]>;
  markProactiveMessage(userId: string, at: number): Promise<void>;
}

/** Map-backed user-state store used for local development and tests. */
export class InMemoryUserStateStore implements UserStateRepository {
  private readonly states = new Map<string, UserState>();

  constructor(private readonly clock: Clock = () => Date.now()) {}

  async getState(userId: string): Promise<UserState | undefined> {
    const state = this.states.get(userId);
    return state ? cloneState(state) : undefined;
  }

  async updateState(userId: string, patch: UserStatePatch): Promise<UserState> {
    const existing = this.states.get(userId) ?? createDefaultState(userId);
    const next: UserState = {
      ...existing,
      ...patch,
      userId,
      lastUpdateAt: this.clock(),
    };
    this.states.set(userId, next);
    return cloneState(next);
  }

  async listWithActivePlan(): Promise<UserState[]> {
    return [...this.states.values()].filter((state) => Boolean(state.activePlan)).map(cloneState);
  }

  async markProactiveMessage(userId: string, at: number): Promise<void> {
    const existing = this.states.get(userId);
    if (existing) {
      this.states.set(userId, { ...existing, lastProactiveMessageAt: at });
    }
  }

  async formatForPrompt(userId: string): Promise<string> {
    const state = this.states.get(userId) ?? createDefaultState(userId);
    return formatCoreMemory(state);
  }
}

/** Render a user state as the markdown "core memory" block of the prompt. */
export function formatCoreMemory(state: UserState): string {
  const lines = [
    `# CORE MEMORY for ${state.name ?? 'Unknown'}`,
    '',
    `**Bio:** ${state.bio ?? 'No biography yet.'}`,
    '',
    ...formatSection('Health', state.health, 'No health issues recorded.'),
    '',
    ...formatSection('Plans', state.plans, 'No plans recorded.'),
    '',
    ...formatSection('Preferences', state.preferences, 'No preferences recorded.'),
  ];

  return lines.join('\n');
}

function formatSection(title: string, items: readonly string[], emptyText: string): string[] {
  const bullets = items.length > 0 ? items : [emptyText];
  return [`**${title}:**`, ...bullets.map((item) => `- ${item}`)];
}

function createDefaultState(userId: string): UserState {
  return { userId, health: [], plans: [], preferences: [] };
}

function cloneState(state: UserState): UserState {
  return {
    ...state,
    health: [...state.health],
    plans: [...state.plans],
    preferences: [...state.preferences],
  };
}
