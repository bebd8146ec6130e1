/**
 * Obsidian vault registry (obsidian.json) types
 */

import { z } from 'zod';

export const vaultEntrySchema = z.object({
  path: z.string(),
  ts: z.number().optional(),
  open: z.boolean().optional(),
});

export const vaultRegistrySchema = z.object({
  vaults: z.record(z.string(), vaultEntrySchema).default({}),
});

export type VaultEntry = z.infer<typeof vaultEntrySchema>;
export type VaultRegistry = z.infer<typeof vaultRegistrySchema>;

export interface ResolvedVault {
  id: string;
  path: string;
}
