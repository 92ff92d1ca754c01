import { Writable } from 'node:stream';
import pino from 'pino';
import { describe, expect, it } from 'vitest';

import { PinoLogger } from '../src/index';

function capture() {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(chunk.toString('utf8'));
      callback();
    }
  });
  return { lines, stream };
}

describe('pino logger', () => {
  it('writes structured entries with child bindings', () => {
    const { lines, stream } = capture();
    const logger = new PinoLogger({ instance: pino({ level: 'debug' }, stream) });

    logger.child({ component: 'word-bank' }).info({ word: 'alpha' }, 'Clip stored');
    logger.debug('plain message');

    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({ level: 30, component: 'word-bank', word: 'alpha', msg: 'Clip stored' });
    expect(JSON.parse(lines[1] ?? '{}')).toMatchObject({ level: 20, msg: 'plain message' });
  });

  it('drops entries below the configured level', () => {
    const { lines, stream } = capture();
    const logger = new PinoLogger({ instance: pino({ level: 'warn' }, stream) });

    logger.info('ignored');
    logger.warn({ attempt: 2 }, 'kept');

    expect(lines.map((line) => JSON.parse(line).msg)).toEqual(['kept']);
  });

  it('binds the service name and redacts credentials', () => {
    const { lines, stream } = capture();
    const logger = new PinoLogger({ level: 'info', destination: stream });

    logger.child({ component: 'generator' }).info({ apiKey: 'sk-test', word: 'alpha' }, 'Provider configured');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
      level: 30,
      service: 'vox',
      component: 'generator',
      apiKey: '[Redacted]',
      word: 'alpha',
      msg: 'Provider configured'
    });
  });
});
