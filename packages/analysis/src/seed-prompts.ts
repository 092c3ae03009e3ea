/**
 * Default prompt templates
 *
 * The prompt pack is a JSON file: shared agent templates, plus per-pattern agents
 * (critic, defence) expanded once for every theme and pattern listed.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import pino from 'pino';
import { ValidationError } from '@caselens/core';
import { withSession } from '@caselens/db';
import type { PromptTemplate, Repositories } from '@caselens/db';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export const DEFAULT_PROMPTS_PATH = fileURLToPath(new URL('../prompts/default-prompts.json', import.meta.url));

const AgentTemplateSchema = z.object({
  agent: z.string().min(1),
  name: z.string().optional(),
  template: z.string().min(1),
});

export const PromptPackSchema = z.object({
  version: z.string().min(1),
  agents: z.array(AgentTemplateSchema),
  patternAgents: z.array(AgentTemplateSchema),
  patterns: z.array(
    z.object({
      theme: z.string().min(1),
      pattern: z.string().min(1),
      name: z.string().min(1),
      description: z.string(),
    })
  ),
});

export type PromptPack = z.infer<typeof PromptPackSchema>;

export interface PromptSeed {
  agent: string;
  theme?: string;
  pattern?: string;
  name?: string;
  version: string;
  template: string;
}

export function loadPromptPack(path: string = DEFAULT_PROMPTS_PATH): PromptPack {
  const parsed = PromptPackSchema.safeParse(JSON.parse(readFileSync(path, 'utf-8')));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid prompt pack ${path}: ${issues.join('; ')}`);
  }
  return parsed.data;
}

/**
 * Flatten a pack into one seed per stored template
 */
export function expandPromptPack(pack: PromptPack): PromptSeed[] {
  const seeds: PromptSeed[] = pack.agents.map((agent) => ({ ...agent, version: pack.version }));

  for (const pattern of pack.patterns) {
    for (const agent of pack.patternAgents) {
      seeds.push({
        agent: agent.agent,
        theme: pattern.theme,
        pattern: pattern.pattern,
        name: `${agent.name ?? agent.agent}: ${pattern.name}`,
        version: pack.version,
        template: agent.template
          .replaceAll('%PATTERN_NAME%', pattern.name)
          .replaceAll('%PATTERN_DESCRIPTION%', pattern.description)
          .replaceAll('%PATTERN_ID%', pattern.pattern),
      });
    }
  }
  return seeds;
}

/**
 * Upsert seeds by (agent, theme, pattern, version) in one session
 */
export function seedPrompts(repos: Repositories, seeds: PromptSeed[] = expandPromptPack(loadPromptPack())): PromptTemplate[] {
  const saved = withSession(repos, (session) => seeds.map((seed) => session.promptTemplates.upsertBy(seed)));
  logger.info({ event: 'analysis.prompts.seeded', count: saved.length }, `Seeded ${saved.length} prompt templates`);
  return saved;
}
