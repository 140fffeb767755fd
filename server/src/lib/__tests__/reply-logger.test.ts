import { ReplyLogger, ReplyLogEntry } from '../reply-logger';

describe('ReplyLogger', () => {
  it('should mask sender addresses in scopes and messages', () => {
    const logger = new ReplyLogger({ echo: false });

    logger.info('Sarah@Example.com', 'reply_generated', 'Drafted reply for sarah@example.com');

    const [entry] = logger.getLogs('sarah@example.com');
    expect(entry.scope).toBe('s***@example.com');
    expect(entry.message).toBe('Drafted reply for s***@example.com');
  });

  it('should redact message content in logged data', () => {
    const logger = new ReplyLogger({ echo: false });

    logger.info('engine', 'edit_recorded', 'Recorded edit', { sentText: 'Hello there', similarity: 0.9 });

    expect(logger.getLogs('engine')[0].data).toEqual({
      sentText: '[11 chars redacted]',
      similarity: 0.9
    });
  });

  it('should drop entries below the configured level', () => {
    const logger = new ReplyLogger({ echo: false, logLevel: 'warn' });

    logger.info('engine', 'noise', 'ignored');
    logger.warn('engine', 'store', 'kept');

    expect(logger.getLogCount('engine')).toBe(1);
  });

  it('should keep only the most recent entries per scope', () => {
    const logger = new ReplyLogger({ echo: false, maxLogsPerScope: 2 });

    logger.info('engine', 'e1', 'one');
    logger.info('engine', 'e2', 'two');
    logger.info('engine', 'e3', 'three');

    expect(logger.getLogs('engine').map(entry => entry.event)).toEqual(['e2', 'e3']);
  });

  it('should emit entries to listeners', () => {
    const logger = new ReplyLogger({ echo: false });
    const seen: ReplyLogEntry[] = [];
    logger.on('log:engine', (entry: ReplyLogEntry) => seen.push(entry));

    logger.error('engine', 'generation_failed', 'failed');

    expect(seen).toHaveLength(1);
    expect(seen[0].level).toBe('error');
  });
});
