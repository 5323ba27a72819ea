import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger, createLoggerSink, redactIp } from '../../src/utils/logger.js';

describe('redactIp', () => {
  it('should keep only the first IPv4 octet', () => {
    expect(redactIp('192.168.1.10')).toBe('192.*.*.*');
    expect(redactIp('192.168.1.10:5000')).toBe('192.*.*.*');
  });

  it('should keep only the first IPv6 segment', () => {
    expect(redactIp('fe80::1')).toBe('fe80:****:****');
  });

  it('should mask empty input', () => {
    expect(redactIp('')).toBe('****');
  });
});

describe('createLoggerSink', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should log rejections as warnings with redacted addresses', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const sink = createLoggerSink(new Logger({ level: 'debug', redactSensitive: true }));

    sink.emit({ type: 'reject', address: '10.1.2.3', reason: 'server_full' });

    expect(warn).toHaveBeenCalledWith('[WARN] [Gate] rejected connection', {
      address: '10.*.*.*',
      reason: 'server_full',
    });
  });

  it('should respect the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const sink = createLoggerSink(new Logger({ level: 'info' }));

    sink.emit({ type: 'validation_error', sessionId: 's1', field: 'message', detail: 'Message cannot be empty' });

    expect(debug).not.toHaveBeenCalled();
  });
});
