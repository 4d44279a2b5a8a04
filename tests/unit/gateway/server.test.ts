import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import { GatewayServer } from '../../../src/gateway/server.js';
import type { GatewayServerConfig } from '../../../src/gateway/types.js';
import { Logger, LogLevel, LogOutput, MemoryTransport } from '../../../src/logging/index.js';
import { hardenPassword, derivePassword } from '../../../src/security/hardener.js';
import { buildRecoveryPackage, toPersistedRecoveryPackage } from '../../../src/security/recovery.js';

const METADATA = { house_name: 'Blue Door', phone_suffix: '9911' };

describe('GatewayServer', () => {
  let server: GatewayServer;
  let transport: MemoryTransport;
  let config: GatewayServerConfig;

  beforeEach(() => {
    transport = new MemoryTransport();
    const logger = new Logger({ minLevel: LogLevel.DEBUG, output: LogOutput.CONSOLE, transport });

    config = {
      httpPort: 0, // 랜덤 포트
      host: '127.0.0.1',
      iterations: 1000,
      maxIterations: 5000,
      saltBytes: 16,
    };

    server = new GatewayServer(config, logger);
  });

  describe('constructor', () => {
    it('should reject a default iteration count above the cap', () => {
      const logger = new Logger({ minLevel: LogLevel.ERROR, output: LogOutput.CONSOLE, transport });

      expect(() => new GatewayServer({ ...config, iterations: 10000 }, logger)).toThrow(
        'Iterations must not exceed 5000, got 10000'
      );
    });
  });

  describe('GET /v1/health', () => {
    it('should report status', async () => {
      const res = await request(server.getApp()).get('/v1/health');

      expect(res.status).toBe(200);
      expect(res.body.success).toBe(true);
      expect(res.body.data.status).toBe('healthy');
      expect(res.body.data.algorithm).toBe('PBKDF2-HMAC-SHA256');
      expect(res.body.data.maxIterations).toBe(5000);
    });
  });

  describe('POST /v1/harden', () => {
    it('should return three variants with analysis and crypto details', async () => {
      const res = await request(server.getApp())
        .post('/v1/harden')
        .send({ password: 'test-secret', ...METADATA });

      expect(res.status).toBe(200);
      const { data } = res.body;
      expect(data.hardened.variants.short.password).toHaveLength(16);
      expect(data.hardened.variants.medium.password).toHaveLength(24);
      expect(data.hardened.variants.long.password).toHaveLength(32);
      expect(data.cryptoDetails.algorithm).toBe('PBKDF2-HMAC-SHA256');
      expect(data.cryptoDetails.iterations).toBe(1000);
      expect(data.cryptoDetails.salt).toMatch(/^[0-9a-f]{32}$/);
      expect(data.original.analysis.length).toBe(11);
      expect(data.metadataHints.house_name).toBe('Bl...');
      expect(data.metadataHints.custom).toBe('Not provided');
    });

    it('should match local hardening with the returned salt', async () => {
      const res = await request(server.getApp())
        .post('/v1/harden')
        .send({ password: 'test-secret', ...METADATA });

      const local = hardenPassword('test-secret', METADATA, {
        iterations: 1000,
        salt: res.body.data.cryptoDetails.salt,
      });
      expect(res.body.data.hardened.variants.medium.password).toBe(local.variants.medium.password);
    });

    it('should not echo the base secret or full key', async () => {
      const res = await request(server.getApp())
        .post('/v1/harden')
        .send({ password: 'test-secret', ...METADATA });

      expect(JSON.stringify(res.body)).not.toContain('test-secret');
      expect(res.body.data.hardenedFull).toBeUndefined();
    });

    it('should require a password', async () => {
      const res = await request(server.getApp()).post('/v1/harden').send({ house_name: 'x' });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('INVALID_INPUT');
      expect(res.body.error.message).toBe('Password is required');
    });

    it('should reject an empty password', async () => {
      const res = await request(server.getApp()).post('/v1/harden').send({ password: '' });

      expect(res.status).toBe(400);
      expect(res.body.error.message).toBe('Password is required');
    });

    it('should reject iterations above the cap', async () => {
      const res = await request(server.getApp())
        .post('/v1/harden')
        .send({ password: 'test-secret', iterations: 6000 });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('INVALID_CONFIG');
    });

    it('should reject malformed JSON', async () => {
      const res = await request(server.getApp())
        .post('/v1/harden')
        .set('Content-Type', 'application/json')
        .send('{"password": ');

      expect(res.status).toBe(400);
      expect(res.body.error.message).toBe('Malformed JSON body');
    });

    it('should log without the password', async () => {
      await request(server.getApp()).post('/v1/harden').send({ password: 'test-secret', ...METADATA });

      const infos = transport.getLogsByLevel(LogLevel.INFO);
      expect(infos.map((entry) => entry.message)).toEqual(['Password hardened']);
      expect(infos[0].requestId).toMatch(/^[0-9a-f-]{36}$/);
      expect(JSON.stringify(transport.getLogs())).not.toContain('test-secret');
    });

    it('should echo the logged request id in the response meta', async () => {
      const res = await request(server.getApp()).post('/v1/harden').send({ password: 'test-secret', ...METADATA });

      const [hardened] = transport.getLogsByLevel(LogLevel.INFO);
      expect(res.body.meta.requestId).toBe(hardened.requestId);
    });

    it('should reuse the request id on malformed JSON errors', async () => {
      const res = await request(server.getApp())
        .post('/v1/harden')
        .set('Content-Type', 'application/json')
        .send('{"password": ');

      const [received] = transport.getLogsByLevel(LogLevel.DEBUG);
      expect(received.message).toBe('POST /v1/harden');
      expect(res.body.meta.requestId).toBe(received.requestId);
    });
  });

  describe('POST /v1/analyze', () => {
    it('should analyze a password', async () => {
      const res = await request(server.getApp()).post('/v1/analyze').send({ password: 'password' });

      expect(res.status).toBe(200);
      expect(res.body.data.analysis.entropy).toBe(37.6);
      expect(res.body.data.analysis.strength).toBe('Moderate');
      expect(res.body.data.analysis.color).toBe('yellow');
    });
  });

  describe('POST /v1/verify', () => {
    const salt = '11223344556677889900aabbccddeeff';
    const hardened = hardenPassword('test-secret', METADATA, { iterations: 1000, salt });

    it('should accept matching inputs', async () => {
      const res = await request(server.getApp())
        .post('/v1/verify')
        .send({ password: 'test-secret', ...METADATA, salt, stored: hardened.variants.medium.password });

      expect(res.status).toBe(200);
      expect(res.body.data).toEqual({ valid: true });
    });

    it('should report a mismatch as valid: false', async () => {
      const res = await request(server.getApp())
        .post('/v1/verify')
        .send({ password: 'wrong-secret', ...METADATA, salt, stored: hardened.variants.medium.password });

      expect(res.status).toBe(200);
      expect(res.body.data).toEqual({ valid: false });
    });

    it('should require the salt', async () => {
      const res = await request(server.getApp())
        .post('/v1/verify')
        .send({ password: 'test-secret', stored: hardened.variants.medium.password });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('INVALID_INPUT');
    });
  });

  describe('POST /v1/recover', () => {
    const salt = 'ffeeddccbbaa00998877665544332211';

    it('should regenerate the requested variant from a package', async () => {
      const pkg = toPersistedRecoveryPackage(buildRecoveryPackage(salt, METADATA, 1000));

      const res = await request(server.getApp())
        .post('/v1/recover')
        .send({ password: 'test-secret', ...METADATA, variant: 'long', package: pkg });

      expect(res.status).toBe(200);
      expect(res.body.data.variant).toBe('long');
      expect(res.body.data.password).toBe(derivePassword('test-secret', METADATA, salt, 32, 1000));
    });

    it('should default to the medium variant', async () => {
      const pkg = toPersistedRecoveryPackage(buildRecoveryPackage(salt, METADATA, 1000));

      const res = await request(server.getApp())
        .post('/v1/recover')
        .send({ password: 'test-secret', ...METADATA, package: pkg });

      expect(res.body.data.variant).toBe('medium');
      expect(res.body.data.password).toHaveLength(24);
    });

    it('should reject a malformed package', async () => {
      const res = await request(server.getApp())
        .post('/v1/recover')
        .send({ password: 'test-secret', package: { secret_key: salt } });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('MALFORMED_DATA');
      expect(res.body.error.message).toBe('Invalid recovery file format!');
    });

    it('should refuse packages above the iteration cap', async () => {
      const pkg = toPersistedRecoveryPackage(buildRecoveryPackage(salt, METADATA, 100000));

      const res = await request(server.getApp())
        .post('/v1/recover')
        .send({ password: 'test-secret', package: pkg });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('INVALID_CONFIG');
    });
  });

  describe('routing', () => {
    it('should return 404 for unknown endpoints', async () => {
      const res = await request(server.getApp()).get('/v1/unknown');

      expect(res.status).toBe(404);
      expect(res.body.error).toEqual({ code: 'NOT_FOUND', message: 'Endpoint not found' });
    });

    it('should allow the configured CORS origin', async () => {
      const res = await request(server.getApp()).get('/v1/health').set('Origin', 'http://localhost:3000');

      expect(res.headers['access-control-allow-origin']).toBe('http://localhost:3000');
    });

    it('should not allow other origins', async () => {
      const res = await request(server.getApp()).get('/v1/health').set('Origin', 'http://evil.example');

      expect(res.headers['access-control-allow-origin']).toBeUndefined();
    });
  });

  describe('start/stop', () => {
    it('should bind to an ephemeral port and stop', async () => {
      await server.start();
      const address = server.getAddress();

      expect(address?.port).toBeGreaterThan(0);

      const res = await request(`http://127.0.0.1:${address?.port}`).get('/v1/health');
      expect(res.status).toBe(200);

      await server.stop();
      expect(server.getAddress()).toBeNull();
    });
  });
});
