import { describe, it, expect, vi } from 'vitest';
import { parsePeers, parsePeersOrThrow, findPeerName, listPeers } from '../src/collection.js';
import { ErrorCodes, PeerEntryParseError } from '../src/errors.js';

const CONFIG = `
[Interface]
ListenPort = 51820
PrivateKey = test-private-key
# PostUp = iptables -A FORWARD -i wg0 -j ACCEPT

[Peer]
# This is a comment
# friendly_name=Office Laptop
# Another comment
PublicKey = alpha-public-key=
AllowedIPs = 10.9.0.2/32

[Peer]
# friendly_name=build-box (rack 2)
PublicKey = beta-public-key=
AllowedIPs = 10.9.0.3/32

[Peer]
# no name here
PublicKey = gamma-public-key=
AllowedIPs = 10.9.0.4/32

[Peer]
#               friendly_name       =               phone
PublicKey = delta-public-key=
AllowedIPs = 10.9.0.5/32
`;

const CONFIG_MISSING_PUBLIC_KEY = `
[Interface]
PrivateKey = test-private-key

[Peer]
# friendly_name = first
PublicKey = alpha-public-key=
AllowedIPs = 10.9.0.2/32

[Peer]
# friendly_name = laptop
AllowedIPs = 10.9.0.3/32

[Peer]
#friendly_name= third
PublicKey = gamma-public-key=
`;

describe('parsePeers', () => {
  describe('valid input', () => {
    it('returns one entry per block keyed by public key', () => {
      const result = parsePeers(CONFIG);
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect([...result.peers.keys()]).toEqual([
          'alpha-public-key=',
          'beta-public-key=',
          'gamma-public-key=',
          'delta-public-key=',
        ]);
        expect(result.peers.get('beta-public-key=')).toEqual({
          publicKey: 'beta-public-key=',
          allowedIps: '10.9.0.3/32',
          name: 'build-box (rack 2)',
        });
      }
    });

    it('extracts friendly names where present', () => {
      const peers = parsePeersOrThrow(CONFIG);
      expect(findPeerName(peers, 'alpha-public-key=')).toBe('Office Laptop');
      expect(findPeerName(peers, 'delta-public-key=')).toBe('phone');
      expect(findPeerName(peers, 'gamma-public-key=')).toBeUndefined();
      expect(findPeerName(peers, 'unknown-key')).toBeUndefined();
    });

    it('never lets [Interface] content into a record', () => {
      const peers = parsePeersOrThrow(CONFIG);
      for (const peer of listPeers(peers)) {
        expect(peer.publicKey).not.toBe('test-private-key');
        expect(peer.allowedIps).not.toContain('iptables');
      }
    });

    it('returns an empty collection when there are no peers', () => {
      const result = parsePeers('[Interface]\nListenPort = 51820\n');
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.peers.size).toBe(0);
      }
    });

    it('keeps the last block for a duplicated public key', () => {
      const text = `[Peer]
# friendly_name = first
PublicKey = shared-key
AllowedIPs = 10.9.0.2/32

[Peer]
# friendly_name = second
PublicKey = shared-key
AllowedIPs = 10.9.0.9/32
`;
      const peers = parsePeersOrThrow(text);
      expect(peers.size).toBe(1);
      expect(peers.get('shared-key')).toEqual({
        publicKey: 'shared-key',
        allowedIps: '10.9.0.9/32',
        name: 'second',
      });
    });
  });

  describe('fail-fast mode', () => {
    it('returns PublicKeyNotFound with the block lines', () => {
      const result = parsePeers(CONFIG_MISSING_PUBLIC_KEY);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(ErrorCodes.PUBLIC_KEY_NOT_FOUND);
        expect(result.error.line).toBe(10);
        expect(result.error.lines).toEqual(['# friendly_name = laptop', 'AllowedIPs = 10.9.0.3/32']);
        expect(result.errors).toEqual([result.error]);
      }
    });

    it('returns AllowedIPsEntryNotFound for a trailing block', () => {
      const text = `[Peer]
# friendly_name=laptop
AllowedIPs = 10.9.0.3/32
PublicKey = beta-public-key=

[Peer]
# friendly_name=server
PublicKey = gamma-public-key=`;
      const result = parsePeers(text);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('AllowedIPsEntryNotFound');
        expect(result.error.lines).toEqual(['# friendly_name=server', 'PublicKey = gamma-public-key=']);
      }
    });

    it('keeps whitespace-only lines in the error payload', () => {
      const result = parsePeers('[Peer]\n   \nAllowedIPs = 10.0.0.2/32\n');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.lines).toEqual(['   ', 'AllowedIPs = 10.0.0.2/32']);
      }
    });

    it('accepts a PublicKey line without equals, using the line as the key', () => {
      const result = parsePeers('[Peer]\nPublicKey\nAllowedIPs = 10.0.0.2/32\n');
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect([...result.peers.keys()]).toEqual(['PublicKey']);
      }
    });

    it('fails an empty [Peer] section with no lines', () => {
      const result = parsePeers('[Interface]\nListenPort = 51820\n\n[Peer]\n\n');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(ErrorCodes.PUBLIC_KEY_NOT_FOUND);
        expect(result.error.lines).toEqual([]);
        expect(result.error.line).toBe(4);
      }
    });
  });

  describe('collect mode', () => {
    it('reports every failing block in order', () => {
      const result = parsePeers(CONFIG_MISSING_PUBLIC_KEY, { mode: 'collect' });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.errors.map((e) => e.code)).toEqual([
          ErrorCodes.PUBLIC_KEY_NOT_FOUND,
          ErrorCodes.ALLOWED_IPS_NOT_FOUND,
        ]);
        expect(result.errors.map((e) => e.line)).toEqual([10, 14]);
        expect(result.error).toBe(result.errors[0]);
      }
    });

    it('succeeds like fail-fast when every block is valid', () => {
      const result = parsePeers(CONFIG, { mode: 'collect' });
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.peers.size).toBe(4);
      }
    });
  });

  describe('logger', () => {
    it('logs segmented blocks and the collection at debug level', () => {
      const debug = vi.fn();
      parsePeers('[Peer]\nPublicKey = alpha-key\nAllowedIPs = 10.9.0.2/32\n', { logger: { debug } });

      expect(debug).toHaveBeenCalledTimes(2);
      expect(debug).toHaveBeenNthCalledWith(
        1,
        { blocks: [{ line: 1, lines: ['PublicKey = alpha-key', 'AllowedIPs = 10.9.0.2/32'] }] },
        'segmented peer blocks'
      );
      expect(debug).toHaveBeenNthCalledWith(
        2,
        { peers: { 'alpha-key': { publicKey: 'alpha-key', allowedIps: '10.9.0.2/32' } } },
        'parsed peer collection'
      );
    });

    it('does not log failures', () => {
      const debug = vi.fn();
      parsePeers('[Peer]\n', { logger: { debug } });
      expect(debug).toHaveBeenCalledTimes(1);
    });
  });
});

describe('parsePeersOrThrow', () => {
  it('throws the first failure', () => {
    expect(() => parsePeersOrThrow(CONFIG_MISSING_PUBLIC_KEY)).toThrow(PeerEntryParseError);
    expect(() => parsePeersOrThrow(CONFIG_MISSING_PUBLIC_KEY)).toThrow(
      'PublicKeyNotFound: [Peer] block at line 10 has no PublicKey entry'
    );
  });
});

describe('listPeers', () => {
  it('lists records in insertion order', () => {
    const peers = parsePeersOrThrow(CONFIG);
    expect(listPeers(peers).map((p) => p.allowedIps)).toEqual([
      '10.9.0.2/32',
      '10.9.0.3/32',
      '10.9.0.4/32',
      '10.9.0.5/32',
    ]);
  });
});
