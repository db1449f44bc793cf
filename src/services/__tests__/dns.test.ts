import { beforeEach, describe, expect, it, vi } from 'vitest';

const { constructed, resolveMx, setServers } = vi.hoisted(() => ({
  constructed: vi.fn(),
  resolveMx: vi.fn(),
  setServers: vi.fn(),
}));

vi.mock('dns/promises', () => ({
  Resolver: class {
    resolveMx = resolveMx;
    setServers = setServers;

    constructor(options: unknown) {
      constructed(options);
    }
  },
}));

import { DnsMxResolver } from '../dns.js';

const dnsError = (code: string): Error => Object.assign(new Error(`queryMx ${code} example.com`), { code });

describe('DnsMxResolver', () => {
  beforeEach(() => {
    constructed.mockReset();
    resolveMx.mockReset();
    setServers.mockReset();
  });

  it('should make a single try bounded by the timeout', () => {
    new DnsMxResolver({ timeoutMs: 1500 });

    expect(constructed).toHaveBeenCalledWith({ timeout: 1500, tries: 1 });
    expect(setServers).not.toHaveBeenCalled();
  });

  it('should use the given name servers', () => {
    new DnsMxResolver({ servers: ['192.0.2.53'] });

    expect(setServers).toHaveBeenCalledWith(['192.0.2.53']);
  });

  it('should report found when the domain has mail exchangers', async () => {
    resolveMx.mockResolvedValue([{ exchange: 'mx.example.com', priority: 10 }]);

    await expect(new DnsMxResolver().resolveMx('example.com')).resolves.toBe('found');
    expect(resolveMx).toHaveBeenCalledWith('example.com');
  });

  it('should report not_found for an empty answer', async () => {
    resolveMx.mockResolvedValue([]);

    await expect(new DnsMxResolver().resolveMx('example.com')).resolves.toBe('not_found');
  });

  it.each(['ENODATA', 'ENOTFOUND', 'ENONAME'])('should report not_found for %s', async (code) => {
    resolveMx.mockRejectedValue(dnsError(code));

    await expect(new DnsMxResolver().resolveMx('example.com')).resolves.toBe('not_found');
  });

  it('should pass other resolver failures on', async () => {
    resolveMx.mockRejectedValue(dnsError('ESERVFAIL'));

    await expect(new DnsMxResolver().resolveMx('example.com')).rejects.toThrow(
      'queryMx ESERVFAIL example.com'
    );
  });
});
