/**
 * Multi-agent critic graph
 *
 *   critic ─┬─ is_witness
 *           ├─ rewrite
 *           └─ defence ─ reviewer
 *
 * The critic proposes candidate phrases, each keyed by the md5 of its content. Every
 * candidate then fans out into three branches that run concurrently with every other
 * (candidate, branch) unit. Branch fragments are merged back onto their candidate by
 * that key once all of them have settled. Any branch failure fails the invocation.
 */

import { z } from 'zod';
import pino from 'pino';
import { LlmResponseError, ValidationError, contentHash, withRetry } from '@caselens/core';
import type { PromptKey, PromptTemplate } from '@caselens/db';
import { parseJsonResponse, renderTemplate } from '@caselens/llm';
import { fanIn, fanOut } from '../graph.js';
import type { Branch } from '../graph.js';
import { AnalysisResponseSchema } from '../types.js';
import type { AnalysisInput, AnalysisResultDraft, AnalysisWorker, WorkerDeps, WorkerSpec } from '../types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

type CriticGraphSpec = Extract<WorkerSpec, { kind: 'critic-graph' }>;

const NO_FINDINGS = /"analysis_results"\s*:\s*\[\s*\]/;

const IsWitnessResponseSchema = z.object({
  response: z.union([z.boolean(), z.string()]),
});

const RewriteResponseSchema = z.object({
  rewritten_phrase: z.string(),
  explanation: z.string().nullable().optional(),
});

const DefenceResponseSchema = z.object({
  argument: z.string(),
  verdict: z.string(),
  pattern: z.string().nullable().optional(),
});

const ReviewerResponseSchema = z.object({
  final_verdict: z.string(),
  self_confidence_score: z.coerce.number(),
  reasoning: z.string(),
});

export interface Candidate {
  hashId: string;
  content: string;
  justification: string | null;
  categories: string[];
  selfConfidence: number | null;
}

export interface BranchFields {
  isWitness: boolean;
  rewrittenPhrase: string;
  rewrittenExplanation: string | null;
  defenceVerdict: string;
  defencePattern: string | null;
  defenceArgument: string;
  reviewerFinalVerdict: string;
  reviewerConfidenceScore: number;
  reviewerReasoning: string;
}

export type CandidateRecord = Candidate & Partial<BranchFields>;
export type BranchFragment = Pick<Candidate, 'hashId'> & Partial<BranchFields>;

interface GraphTemplates {
  critic: PromptTemplate;
  isWitness: PromptTemplate;
  rewrite: PromptTemplate;
  defence: PromptTemplate;
  reviewer: PromptTemplate;
}

/**
 * Read a yes/no style answer
 */
export function toWitnessFlag(response: boolean | string): boolean {
  if (typeof response === 'boolean') {
    return response;
  }
  const normalised = response.trim().toLowerCase();
  if (normalised === 'yes' || normalised === 'true') return true;
  if (normalised === 'no' || normalised === 'false') return false;
  throw new LlmResponseError(`Unrecognised is_witness response "${response}"`, response);
}

/**
 * Add the fragment's fields to the record; fields the record already holds win
 */
export function mergeFragment(record: CandidateRecord, fragment: BranchFragment): CandidateRecord {
  return { ...fragment, ...record };
}

/**
 * Collapse candidates with a repeated hash onto the first occurrence
 */
function uniqueByHash(candidates: Candidate[]): Candidate[] {
  const seen = new Set<string>();
  return candidates.filter((candidate) => {
    if (seen.has(candidate.hashId)) {
      return false;
    }
    seen.add(candidate.hashId);
    return true;
  });
}

export function createCriticGraphWorker(spec: CriticGraphSpec, { promptTemplates, llm, retry }: WorkerDeps): AnalysisWorker {
  const { themeId, patternId } = spec;

  function requireTemplate(label: string, key: PromptKey): PromptTemplate {
    const template = promptTemplates.getLatest(key);
    if (!template) {
      throw new ValidationError(
        `No ${label} prompt template found (agent=${key.agent ?? '-'}, theme=${key.theme ?? '-'}, pattern=${key.pattern ?? '-'})`
      );
    }
    return template;
  }

  function loadTemplates(): GraphTemplates {
    return {
      critic: requireTemplate('critic', { agent: 'critic', theme: themeId, pattern: patternId }),
      isWitness: requireTemplate('is_witness', { agent: 'is_witness' }),
      rewrite: requireTemplate('rewrite', { agent: 'rewrite' }),
      defence: requireTemplate('defence', { agent: 'defence', theme: themeId, pattern: patternId }),
      reviewer: requireTemplate('reviewer', { agent: 'reviewer' }),
    };
  }

  async function critic(template: PromptTemplate, text: string): Promise<Candidate[]> {
    const prompt = renderTemplate(template.template, { contextText: text });

    return withRetry(
      async () => {
        const raw = await llm.complete(prompt);
        if (NO_FINDINGS.test(raw)) {
          return [];
        }
        const parsed = AnalysisResponseSchema.safeParse(parseJsonResponse(raw));
        if (!parsed.success) {
          throw new LlmResponseError('Critic response failed validation', raw.substring(0, 500));
        }
        return (parsed.data.analysis_results ?? []).map((finding) => ({
          hashId: contentHash(finding.content),
          content: finding.content,
          justification: finding.justification ?? null,
          categories: finding.categories ?? [],
          selfConfidence: finding.self_confidence ?? null,
        }));
      },
      { ...retry, label: `critic:${themeId}-${patternId}` }
    );
  }

  function branches(templates: GraphTemplates, text: string): Array<Branch<Candidate, BranchFragment>> {
    const variables = (candidate: Candidate) => ({
      police_report: text,
      contextText: text,
      phrase: candidate.content,
      justification: candidate.justification,
      pattern: patternId,
    });

    const isWitness: Branch<Candidate, BranchFragment> = async (candidate) => {
      const prompt = renderTemplate(templates.isWitness.template, variables(candidate));
      const flag = await withRetry(
        async () => toWitnessFlag((await llm.completeJson(prompt, IsWitnessResponseSchema)).response),
        { ...retry, label: 'is_witness' }
      );
      return { hashId: candidate.hashId, isWitness: flag };
    };

    const rewrite: Branch<Candidate, BranchFragment> = async (candidate) => {
      const prompt = renderTemplate(templates.rewrite.template, variables(candidate));
      const response = await withRetry(() => llm.completeJson(prompt, RewriteResponseSchema), {
        ...retry,
        label: 'rewrite',
      });
      return {
        hashId: candidate.hashId,
        rewrittenPhrase: response.rewritten_phrase,
        rewrittenExplanation: response.explanation ?? null,
      };
    };

    const defenceThenReviewer: Branch<Candidate, BranchFragment> = async (candidate) => {
      const defencePrompt = renderTemplate(templates.defence.template, variables(candidate));
      const defence = await withRetry(() => llm.completeJson(defencePrompt, DefenceResponseSchema), {
        ...retry,
        label: 'defence',
      });

      // Reviewer is a single attempt
      const reviewerPrompt = renderTemplate(templates.reviewer.template, {
        ...variables(candidate),
        defence_argument: defence.argument,
        defence_verdict: defence.verdict,
        defence_pattern: defence.pattern,
      });
      const reviewer = await llm.completeJson(reviewerPrompt, ReviewerResponseSchema);

      return {
        hashId: candidate.hashId,
        defenceVerdict: defence.verdict,
        defencePattern: defence.pattern ?? null,
        defenceArgument: defence.argument,
        reviewerFinalVerdict: reviewer.final_verdict,
        reviewerConfidenceScore: reviewer.self_confidence_score,
        reviewerReasoning: reviewer.reasoning,
      };
    };

    return [isWitness, rewrite, defenceThenReviewer];
  }

  return {
    /** Each model call retries on its own; a failed branch fails the section and the graph is not re-run as a whole */
    async analyze(input: AnalysisInput): Promise<AnalysisResultDraft[]> {
      const startTime = Date.now();
      const templates = loadTemplates();

      const candidates = uniqueByHash(await critic(templates.critic, input.text));
      logger.info(
        { event: 'analysis.critic.done', sectionId: input.sectionId, themeId, patternId, candidates: candidates.length },
        `Critic proposed ${candidates.length} candidates`
      );
      if (candidates.length === 0) {
        return [];
      }

      const fragments = await fanOut(candidates, branches(templates, input.text));
      const records = fanIn<CandidateRecord, BranchFragment>(
        candidates,
        fragments,
        { record: (record) => record.hashId, fragment: (fragment) => fragment.hashId },
        mergeFragment
      );

      logger.info(
        {
          event: 'analysis.critic_graph.success',
          sectionId: input.sectionId,
          analysisJobId: input.analysisJobId,
          themeId,
          patternId,
          results: records.length,
          durationMs: Date.now() - startTime,
        },
        `Found ${records.length} results`
      );

      return records.map((record) => ({
        analysisJobId: input.analysisJobId,
        experimentId: input.experimentId,
        promptTemplateId: templates.critic.id,
        themeId,
        patternId,
        content: record.content,
        justification: record.justification,
        categoryId: record.categories.join(', '),
        selfConfidence: record.selfConfidence,
        isWitness: record.isWitness ?? null,
        rewrittenPhrase: record.rewrittenPhrase ?? null,
        rewrittenExplanation: record.rewrittenExplanation ?? null,
        defenceVerdict: record.defenceVerdict ?? null,
        defencePattern: record.defencePattern ?? null,
        defenceArgument: record.defenceArgument ?? null,
        reviewerFinalVerdict: record.reviewerFinalVerdict ?? null,
        reviewerConfidenceScore: record.reviewerConfidenceScore ?? null,
        reviewerReasoning: record.reviewerReasoning ?? null,
      }));
    },
  };
}
