/**
 * The slice of the ioredis client the Redis stores call.
 * `Redis` satisfies it structurally; tests hand the stores in-process stubs.
 */

export type PipelineReply = [error: Error | null, result: unknown];

export interface HashPipeline {
  hgetall(key: string): unknown;
  exec(): Promise<PipelineReply[] | null>;
}

export interface StoreCommands {
  get(key: string): Promise<string | null>;
  hgetall(key: string): Promise<Record<string, string>>;
  zrange(key: string, start: number, stop: number): Promise<string[]>;
  zrevrange(key: string, start: number, stop: number, withScores: 'WITHSCORES'): Promise<string[]>;
  eval(script: string, numKeys: number, ...args: Array<string | number>): Promise<unknown>;
  pipeline(): HashPipeline;
  ping(): Promise<string>;
}
