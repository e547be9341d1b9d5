import { describe, it, expect } from 'vitest';
import { createLogger } from './logger';

function captureLogger(name: string) {
  const lines: string[] = [];
  const log = createLogger({
    name,
    level: 'info',
    destination: {
      write: (msg: string) => {
        lines.push(msg);
      },
    },
  });
  return { log, lines };
}

describe('createLogger', () => {
  it('writes structured JSON with uppercased level and service binding', () => {
    const { log, lines } = captureLogger('candles:sync');

    log.info({ event: 'gap_detected', missing: 1 }, 'Gap detected');

    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0]);
    expect(entry.level).toBe('INFO');
    expect(entry.name).toBe('candles:sync');
    expect(entry.service).toBe('candles');
    expect(entry.event).toBe('gap_detected');
    expect(entry.missing).toBe(1);
    expect(entry.msg).toBe('Gap detected');
  });

  it('drops entries below the configured level', () => {
    const { log, lines } = captureLogger('liquidity:map');

    log.debug('refresh detail');

    expect(lines).toHaveLength(0);
    expect(log.isLevelEnabled('debug')).toBe(false);
    expect(log.isLevelEnabled('warn')).toBe(true);
  });

  it('propagates child bindings', () => {
    const { log, lines } = captureLogger('engine');

    log.child({ symbol: 'BTCUSDT' }).warn('window short');

    const entry = JSON.parse(lines[0]);
    expect(entry.symbol).toBe('BTCUSDT');
    expect(entry.level).toBe('WARN');
    expect(entry.msg).toBe('window short');
  });
});
