import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { BackgroundExtractionUseCase } from '../../../src/application/BackgroundExtractionUseCase.js';
import { ExtractionUseCase } from '../../../src/application/ExtractionUseCase.js';
import { ChangeSetExtractor } from '../../../src/application/ChangeSetExtractor.js';
import { SummaryInputFormatter } from '../../../src/application/formatters/SummaryInputFormatter.js';
import { FileLockStore } from '../../../src/infrastructure/lock/FileLockStore.js';
import {
  InMemoryBriefingStore,
  InMemoryInsightStore,
  InMemoryTranscriptSource,
  StubSummarizer,
  noWorkTreeVcs,
  sessionInfo,
} from '../../helpers/fakes.js';
import { userMessage } from '../../helpers/transcript.js';

describe('BackgroundExtractionUseCase', () => {
  let locksDir: string;
  let locks: FileLockStore;
  let background: BackgroundExtractionUseCase;

  beforeEach(() => {
    locksDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sessbrief-background-'));
    locks = new FileLockStore(locksDir);
    const extraction = new ExtractionUseCase({
      source: new InMemoryTranscriptSource([{ info: sessionInfo(), messages: [userMessage('hi')] }]),
      extractor: new ChangeSetExtractor(noWorkTreeVcs),
      formatter: new SummaryInputFormatter(),
      summarizer: new StubSummarizer(),
      briefings: new InMemoryBriefingStore(),
      insights: new InMemoryInsightStore(),
    });
    background = new BackgroundExtractionUseCase(extraction, locks);
  });

  afterEach(() => {
    fs.rmSync(locksDir, { recursive: true, force: true });
  });

  it('should release the lock after a successful run', async () => {
    locks.createLock('sess-1');

    const result = await background.run({ sessionId: 'sess-1' });

    expect(result?.briefing.sessionId).toBe('sess-1');
    expect(fs.existsSync(locks.lockPath('sess-1'))).toBe(false);
  });

  /**
   * Scenario: 背景分析失敗
   * Given session 不存在
   * When 執行背景分析
   * Then 不拋錯、回傳 undefined，且 lock 仍被釋放
   */
  it('should swallow a failure and still release the lock', async () => {
    locks.createLock('missing');

    const result = await background.run({ sessionId: 'missing' });

    expect(result).toBeUndefined();
    expect(fs.existsSync(locks.lockPath('missing'))).toBe(false);
  });
});
