import fs from 'node:fs';
import { z } from 'zod';
import { logger } from '../utils/logger.js';

const aliasFileSchema = z.record(z.string().min(1));

/**
 * Maps display names from external feeds onto the canonical names used in
 * the statistics dataset. Unknown names pass through trimmed, so the stats
 * store still decides whether a team exists.
 */
export class TeamNameResolver {
  // lowercase alias -> canonical name
  private readonly aliasMap = new Map<string, string>();

  constructor(aliases: Record<string, string> = {}) {
    for (const [alias, canonical] of Object.entries(aliases)) {
      this.aliasMap.set(alias.toLowerCase().trim(), canonical);
    }
  }

  static fromFile(file: string): TeamNameResolver {
    const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
    const resolver = new TeamNameResolver(aliasFileSchema.parse(raw));
    logger.info({ aliasCount: resolver.size, file }, 'Team aliases loaded');
    return resolver;
  }

  get size(): number {
    return this.aliasMap.size;
  }

  entries(): [alias: string, canonical: string][] {
    return [...this.aliasMap.entries()];
  }

  resolve(rawName: string): string {
    const trimmed = rawName.trim();
    return this.aliasMap.get(trimmed.toLowerCase()) ?? trimmed;
  }
}
