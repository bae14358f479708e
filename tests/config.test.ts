import { ZodError } from 'zod';
import { loadConfig, parseArgs } from '../src/config.js';

const ARGV = ['node', 'index.js'];

describe('Configuration', () => {
  describe('parseArgs', () => {
    test('should read values and bare flags', () => {
      expect(parseArgs([...ARGV, '--port', '9000', '--debug', '--host', 'localhost'])).toEqual({
        port: '9000',
        debug: true,
        host: 'localhost',
      });
    });

    test('should ignore positional arguments', () => {
      expect(parseArgs([...ARGV, 'serve', '--debug'])).toEqual({ debug: true });
    });
  });

  describe('loadConfig', () => {
    test('should apply defaults when only the API key is set', () => {
      expect(loadConfig(ARGV, { API_KEY: 'test-secret' })).toEqual({
        server: { name: 'conversation-service', version: '1.0.0', debug: false },
        http: { host: '0.0.0.0', port: 8000 },
        auth: { apiKey: 'test-secret' },
        database: { path: 'data/conversations.db' },
        pagination: { defaultPageSize: 10 },
      });
    });

    test('should read the environment', () => {
      const config = loadConfig(ARGV, {
        API_KEY: 'test-secret',
        PORT: '9000',
        DEBUG: 'true',
        DATABASE_PATH: '/tmp/chat.db',
        DEFAULT_PAGE_SIZE: '25',
      });

      expect(config.http.port).toBe(9000);
      expect(config.server.debug).toBe(true);
      expect(config.database.path).toBe('/tmp/chat.db');
      expect(config.pagination.defaultPageSize).toBe(25);
    });

    test('should let CLI arguments override the environment', () => {
      const config = loadConfig([...ARGV, '--port', '7000', '--api-key', 'cli-secret'], {
        API_KEY: 'test-secret',
        PORT: '9000',
      });

      expect(config.http.port).toBe(7000);
      expect(config.auth.apiKey).toBe('cli-secret');
    });

    test('should require an API key', () => {
      expect(() => loadConfig(ARGV, {})).toThrow(ZodError);
    });

    test('should reject a non-numeric port', () => {
      expect(() => loadConfig(ARGV, { API_KEY: 'test-secret', PORT: 'eighty' })).toThrow(ZodError);
    });

    test('should reject a page size below 1', () => {
      expect(() => loadConfig(ARGV, { API_KEY: 'test-secret', DEFAULT_PAGE_SIZE: '0' })).toThrow(
        ZodError
      );
    });
  });
});
