/**
 * In-process stand-in for the Redis commands the stores call.
 * Keys hold canned data; `eval` answers with whatever `evalReply` returns.
 */

import type { HashPipeline, PipelineReply, StoreCommands } from '../../src/infra/redis/redis-commands.js';

export class StubRedis implements StoreCommands {
  strings = new Map<string, string>();
  hashes = new Map<string, Record<string, string>>();
  sortedSets = new Map<string, Array<{ member: string; score: number }>>();
  failingHashes = new Set<string>();

  evalCalls: Array<{ numKeys: number; args: Array<string | number> }> = [];
  evalReply: () => Promise<unknown> = async () => null;
  pingReply: () => Promise<string> = async () => 'PONG';

  async get(key: string): Promise<string | null> {
    return this.strings.get(key) ?? null;
  }

  async hgetall(key: string): Promise<Record<string, string>> {
    if (this.failingHashes.has(key)) {
      throw new Error('ECONNRESET');
    }
    return { ...(this.hashes.get(key) ?? {}) };
  }

  async zrange(key: string, start: number, stop: number): Promise<string[]> {
    const members = this.sorted(key).map((entry) => entry.member);
    return members.slice(start, stop === -1 ? undefined : stop + 1);
  }

  async zrevrange(key: string, start: number, stop: number): Promise<string[]> {
    return this.sorted(key)
      .reverse()
      .slice(start, stop + 1)
      .flatMap((entry) => [entry.member, String(entry.score)]);
  }

  async eval(_script: string, numKeys: number, ...args: Array<string | number>): Promise<unknown> {
    this.evalCalls.push({ numKeys, args });
    return this.evalReply();
  }

  pipeline(): HashPipeline {
    const keys: string[] = [];
    return {
      hgetall: (key: string) => {
        keys.push(key);
      },
      exec: async () =>
        keys.map((key): PipelineReply =>
          this.failingHashes.has(key) ? [new Error('READONLY'), null] : [null, this.hashes.get(key) ?? {}]
        )
    };
  }

  ping(): Promise<string> {
    return this.pingReply();
  }

  private sorted(key: string): Array<{ member: string; score: number }> {
    return [...(this.sortedSets.get(key) ?? [])].sort((a, b) => a.score - b.score);
  }
}
