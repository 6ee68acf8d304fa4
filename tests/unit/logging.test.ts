import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { getLogger, __resetLoggerForTests, __enableTestLogCollector } from '../../src/utils/logging.js';

describe('logging singleton', () => {
  const original = process.env.LOG_LEVEL;

  beforeEach(() => {
    __resetLoggerForTests();
  });

  afterEach(() => {
    if (original === undefined) delete process.env.LOG_LEVEL;
    else process.env.LOG_LEVEL = original;
    __resetLoggerForTests();
  });

  it('returns same instance', () => {
    const a = getLogger();
    const b = getLogger();
    expect(a).toBe(b);
  });

  it('honors LOG_LEVEL env', () => {
    process.env.LOG_LEVEL = 'debug';
    __resetLoggerForTests();
    const l = getLogger();
    expect(l.level).toBe('debug');
  });

  it('collects structured lines in memory', () => {
    const logs = __enableTestLogCollector('warn');
    getLogger().info('ignored');
    getLogger().warn({ snapshotId: 'snap-1' }, 'snapshot deleted');
    expect(logs).toHaveLength(1);
    expect(JSON.parse(logs[0])).toMatchObject({ app: 'ec2-evidence', msg: 'snapshot deleted', snapshotId: 'snap-1' });
  });
});
