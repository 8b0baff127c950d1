export { SessionLifecycleService } from './lifecycle-service';
export type { SessionLifecycleOptions, SessionStores } from './lifecycle-service';
export type { AssistantSessionRegistry, SessionAgent } from './session-agent';
export { ExtractiveSummarizer } from './summarizer';
export type { ExtractiveSummarizerOptions, Summarizer } from './summarizer';
