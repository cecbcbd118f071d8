export type LogMsgType = 'warn' | 'info' | 'success' | 'fail' | 'error' | 'title'

export type StreamType = 'video' | 'audio'

export interface RetryPolicy {
  maxAttempts: number
  // pause before the attempt following `attempt` (1-based), in ms
  backoff: (attempt: number) => number
}

export interface ProgressReporter {
  start(name: string, total: number): void
  advance(bytes: number): void
  finish(): void
  fail(): void
}

export interface CommandRunner {
  run(args: string[]): Promise<string>
}
