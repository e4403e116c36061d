/**
 * Server CLI Command Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';

// ============================================================================
// Hoisted mocks
// ============================================================================

const mockStartServer = vi.hoisted(() => vi.fn());

vi.mock('@content-intel/gateway', () => ({
  startServer: mockStartServer,
  startIntelRuntime: vi.fn(),
  stopIntelRuntime: vi.fn(),
}));

import { serverStart } from './server.js';

describe('Server CLI Command', () => {
  const originalEnv = { ...process.env };
  let errorSpy: ReturnType<typeof vi.spyOn>;
  let exitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    vi.clearAllMocks();
    delete process.env.PORT;
    delete process.env.HOST;
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
    mockStartServer.mockResolvedValue(undefined);
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it('starts the server with the environment as is', async () => {
    await serverStart();

    expect(mockStartServer).toHaveBeenCalledTimes(1);
    expect(process.env.PORT).toBeUndefined();
    expect(process.env.HOST).toBeUndefined();
  });

  it('overrides port and host from options', async () => {
    await serverStart({ port: '9090', host: '0.0.0.0' });

    expect(process.env.PORT).toBe('9090');
    expect(process.env.HOST).toBe('0.0.0.0');
    expect(mockStartServer).toHaveBeenCalledTimes(1);
  });

  it('rejects an invalid port without starting', async () => {
    await serverStart({ port: '70000' });

    expect(errorSpy).toHaveBeenCalledWith('Error: Invalid port: 70000');
    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(mockStartServer).not.toHaveBeenCalled();
  });

  it('exits 1 when startup fails', async () => {
    mockStartServer.mockRejectedValue(new Error('Failed to connect to PostgreSQL'));

    await serverStart();

    expect(errorSpy).toHaveBeenCalledWith('Error: Failed to connect to PostgreSQL');
    expect(exitSpy).toHaveBeenCalledWith(1);
  });
});
