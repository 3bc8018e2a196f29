import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as winston from 'winston';
import { createWinstonLogger } from './winston-logger.service';

describe('createWinstonLogger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('logs to the console only without a log directory', () => {
    const logger = createWinstonLogger();

    expect(logger.transports).toHaveLength(1);
    expect(logger.transports[0]).toBeInstanceOf(winston.transports.Console);
    expect(logger.level).toBe('debug');
    logger.close();
  });

  it('falls back to the console when the directory cannot be created', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const scratch = fs.mkdtempSync(path.join(os.tmpdir(), 'stepforge-log-'));
    const blocker = path.join(scratch, 'not-a-directory');
    fs.writeFileSync(blocker, '');

    const logger = createWinstonLogger(path.join(blocker, 'logs'));

    expect(logger.transports).toHaveLength(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(String(errorSpy.mock.calls[0][0])).toContain(
      `Failed to create log directory ${path.join(blocker, 'logs')}`,
    );
    logger.close();
    fs.rmSync(scratch, { recursive: true, force: true });
  });
});
