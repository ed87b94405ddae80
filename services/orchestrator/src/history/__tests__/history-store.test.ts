/**
 * History Store Tests
 * Runs against an in-memory stand-in for the sorted set and id set the Lua script maintains
 */

import { describe, it, expect, vi } from 'vitest';
import type { HistoryConfig, StoredMessage } from '@fusionchat/shared-types';
import { HistoryStore, type HistoryBackend } from '../history-store.js';

class InMemoryHistoryBackend implements HistoryBackend {
  readonly sets = new Map<string, Array<{ score: number; member: string }>>();
  readonly ids = new Map<string, Set<string>>();

  async eval(_script: string, _numKeys: number, ...args: Array<string | number>): Promise<unknown> {
    const [key, idsKey, json, timestamp, messageId, maxMessages] = args.map(String);
    if (!key || !idsKey || !json || !messageId) throw new Error('missing script arguments');

    const ids = this.ids.get(idsKey) ?? new Set<string>();
    if (ids.has(messageId)) return 0;
    ids.add(messageId);
    this.ids.set(idsKey, ids);

    const entries = this.sets.get(key) ?? [];
    entries.push({ score: Number(timestamp), member: json });
    entries.sort((a, b) => a.score - b.score);
    this.sets.set(key, entries.slice(Math.max(0, entries.length - Number(maxMessages))));
    return 1;
  }

  async zrevrange(key: string, start: number, stop: number): Promise<string[]> {
    const entries = [...(this.sets.get(key) ?? [])].reverse();
    return entries.slice(start, stop + 1).map((entry) => entry.member);
  }

  async zcard(key: string): Promise<number> {
    return this.sets.get(key)?.length ?? 0;
  }

  async del(...keys: string[]): Promise<number> {
    let removed = 0;
    for (const key of keys) {
      if (this.sets.delete(key) || this.ids.delete(key)) removed++;
    }
    return removed;
  }
}

const config: HistoryConfig = {
  enabled: true,
  storage: { maxMessages: 2, ttlSeconds: 60, keyPrefix: 'HISTORY:' },
  retrieval: { promptMessages: 10, searchMessages: 30, maxMessageLength: 12, minWordLength: 3 },
};

function message(id: string, role: StoredMessage['role'], content: string, timestamp: number): StoredMessage {
  return { id, role, content, timestamp, sessionId: 's1' };
}

describe('HistoryStore', () => {
  it('should keep the newest messages up to the limit', async () => {
    const backend = new InMemoryHistoryBackend();
    const store = new HistoryStore(backend, config);

    await store.addMessage(message('m1', 'user', 'first', 1000));
    await store.addMessage(message('m2', 'assistant', 'second', 2000));
    await store.addMessage(message('m3', 'user', 'third', 3000));

    const history = await store.getHistory('s1');
    expect(history.map((m) => m.id)).toEqual(['m3', 'm2']);
    expect(await store.getHistoryCount('s1')).toBe(2);
  });

  it('should pass keys, message and limits to the script', async () => {
    const backend = new InMemoryHistoryBackend();
    const evalSpy = vi.spyOn(backend, 'eval');
    const store = new HistoryStore(backend, config);
    const stored = message('m1', 'user', 'first', 1000);

    await store.addMessage(stored);

    expect(evalSpy).toHaveBeenCalledWith(
      expect.stringContaining('SISMEMBER'),
      2,
      'HISTORY:s1',
      'HISTORY:s1:ids',
      JSON.stringify(stored),
      '1000',
      'm1',
      '2',
      '60'
    );
  });

  it('should ignore a redelivered message id', async () => {
    const store = new HistoryStore(new InMemoryHistoryBackend(), config);

    expect(await store.addMessage(message('m1', 'user', 'first', 1000))).toBe(true);
    expect(await store.addMessage(message('m1', 'user', 'first', 1000))).toBe(false);
  });

  it('should report a failed write without throwing', async () => {
    const backend = new InMemoryHistoryBackend();
    vi.spyOn(backend, 'eval').mockRejectedValue(new Error('connection lost'));
    const store = new HistoryStore(backend, config);

    expect(await store.addMessage(message('m1', 'user', 'first', 1000))).toBe(false);
  });

  it('should return prompt messages oldest first and truncated', async () => {
    const store = new HistoryStore(new InMemoryHistoryBackend(), config);
    await store.addMessage(message('m1', 'user', 'hello world again', 1000));
    await store.addMessage(message('m2', 'assistant', 'short', 2000));

    expect(await store.getPromptMessages('s1')).toEqual([
      { role: 'user', content: 'hello world...' },
      { role: 'assistant', content: 'short' },
    ]);
  });

  it('should return no prompt messages when history is disabled', async () => {
    const backend = new InMemoryHistoryBackend();
    const store = new HistoryStore(backend, { ...config, enabled: false });
    await store.addMessage(message('m1', 'user', 'first', 1000));

    expect(await store.getPromptMessages('s1')).toEqual([]);
  });

  it('should skip entries that are not valid messages', async () => {
    const backend = new InMemoryHistoryBackend();
    backend.sets.set('HISTORY:s1', [
      { score: 1, member: '{not json' },
      { score: 2, member: JSON.stringify({ id: 'x', role: 'system', content: 'c', timestamp: 2, sessionId: 's1' }) },
      { score: 3, member: JSON.stringify(message('m3', 'user', 'ok', 3)) },
    ]);
    const store = new HistoryStore(backend, config);

    expect(await store.getHistory('s1')).toEqual([message('m3', 'user', 'ok', 3)]);
  });

  it('should clear both the history and its id set', async () => {
    const backend = new InMemoryHistoryBackend();
    const delSpy = vi.spyOn(backend, 'del');
    const store = new HistoryStore(backend, config);
    await store.addMessage(message('m1', 'user', 'first', 1000));

    await store.clearHistory('s1');

    expect(delSpy).toHaveBeenCalledWith('HISTORY:s1', 'HISTORY:s1:ids');
    expect(await store.getHistory('s1')).toEqual([]);
  });
});
