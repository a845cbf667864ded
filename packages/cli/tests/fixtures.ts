import { createLogger } from '../src/logger.js';

export const VALID_CONFIG = `[Interface]
ListenPort = 51820
PrivateKey = test-private-key

[Peer]
# friendly_name = desk
PublicKey = alpha-key
AllowedIPs = 10.9.0.2/32

[Peer]
PublicKey = beta-key
AllowedIPs = 10.9.0.3/32
`;

export const INVALID_CONFIG = `[Peer]
# friendly_name = laptop
AllowedIPs = 10.9.0.3/32

[Peer]
PublicKey = gamma-key
`;

export function silentLogger() {
  return createLogger('silent', { write: () => {} });
}
