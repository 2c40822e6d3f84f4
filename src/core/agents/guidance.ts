import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const GUIDANCE_FILENAME = 'guidance.json';

const DomainGuidanceSchema = z.object({
  summary: z.string().min(1),
  confidence: z.number().min(0).max(1).default(0.8),
  recommendations: z.array(z.string()).default([]),
  /** Topic tag → topic-specific advice */
  topics: z.record(z.string()).default({}),
});

const GuidanceFileSchema = z.object({
  version: z.number().int().positive(),
  domains: z.record(DomainGuidanceSchema),
});

export type DomainGuidance = z.output<typeof DomainGuidanceSchema>;

/**
 * Source of the advisory text each domain agent returns
 */
export interface GuidanceProvider {
  getGuidance(domain: string): DomainGuidance | null;
}

/**
 * Guidance held in memory
 */
export class StaticGuidanceProvider implements GuidanceProvider {
  private domains: Map<string, DomainGuidance>;

  constructor(domains: Record<string, DomainGuidance>) {
    this.domains = new Map(Object.entries(domains));
  }

  getGuidance(domain: string): DomainGuidance | null {
    return this.domains.get(domain) ?? null;
  }

  listDomains(): string[] {
    return [...this.domains.keys()];
  }
}

/**
 * Find data/guidance.json by walking up from this module's directory, so
 * the lookup works from both the sources and the build output.
 */
export function findGuidanceFile(startDir: string = dirname(fileURLToPath(import.meta.url))): string | null {
  let currentDir = startDir;

  while (currentDir !== dirname(currentDir)) {
    const candidate = join(currentDir, 'data', GUIDANCE_FILENAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    currentDir = dirname(currentDir);
  }

  return null;
}

/**
 * Load and validate a guidance file
 */
export function loadGuidance(filePath: string | null = findGuidanceFile()): StaticGuidanceProvider {
  if (!filePath) {
    throw new Error(`Guidance file not found: data/${GUIDANCE_FILENAME}`);
  }

  try {
    const content = readFileSync(filePath, 'utf-8');
    const parsed = GuidanceFileSchema.parse(JSON.parse(content));
    return new StaticGuidanceProvider(parsed.domains);
  } catch (error) {
    if (error instanceof Error) {
      throw new Error(`Failed to load guidance: ${error.message}`);
    }
    throw error;
  }
}
