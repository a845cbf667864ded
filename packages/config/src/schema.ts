/**
 * Zod schema for peer records received as JSON (e.g. `wgpeers list --json`)
 */
import { z } from 'zod';

export const PeerRecordSchema = z
  .object({
    publicKey: z.string().min(1),
    allowedIps: z.string().min(1),
    name: z.string().optional(),
  })
  .strict();

export type PeerRecordType = z.infer<typeof PeerRecordSchema>;
