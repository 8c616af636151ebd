/**
 * NL2SQL agent.
 *
 * Turns a natural-language question into a candidate statement with the
 * configured LLM provider and hands it to the query pipeline. The model
 * only ever sees the part of the schema the caller's role may read, and
 * whatever it writes is treated as untrusted input by the pipeline.
 */

import { z } from 'zod';

import type { AccessPolicy, ChatRequest, ChatResponse, Identity } from '../../shared/types';
import { MAX_QUESTION_LENGTH, MAX_ROWS } from '../../shared/constants';
import { describeSchema, type SchemaCatalog } from '../db/schema-catalog';
import { errorMessage, GenerationError } from '../lib/errors';
import { renderRowFilter } from '../lib/row-filter';
import { DEFAULT_MAX_TOKENS, getLLMProvider, type LLMProvider } from '../llm';
import type { QueryPipeline } from './query-pipeline';

// ---------------------------------------------------------------------------
// Generator output
// ---------------------------------------------------------------------------

export type GeneratorOutcome =
  | { kind: 'sql'; sql: string; explanation: string }
  | { kind: 'clarification'; message: string }
  | { kind: 'refusal'; message: string };

const GeneratorReplySchema = z.object({
  sql: z.string().nullish(),
  explanation: z.string().nullish(),
  needsClarification: z.boolean().default(false),
  clarificationMessage: z.string().nullish(),
  refused: z.boolean().default(false),
  refusalMessage: z.string().nullish(),
});

const CLARIFY_PREFIX = 'CLARIFY:';

/**
 * Decode a model reply: reasoning blocks and markdown fences are removed,
 * then the JSON body is validated. A bare `CLARIFY: ...` line is accepted
 * as a clarification request.
 */
export function parseGeneratorReply(text: string): GeneratorOutcome {
  let body = text.replace(/<think>[\s\S]*?<\/think>/gi, '').trim();
  if (body.startsWith('```')) {
    body = body.replace(/^```(?:json|sql)?\n?/, '').replace(/\n?```$/, '').trim();
  }

  if (body.toUpperCase().startsWith(CLARIFY_PREFIX)) {
    return { kind: 'clarification', message: body.slice(CLARIFY_PREFIX.length).trim() };
  }

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    throw new GenerationError('Failed to parse model reply as JSON');
  }

  const parsed = GeneratorReplySchema.safeParse(json);
  if (!parsed.success) {
    throw new GenerationError(`Model reply has an unexpected shape: ${parsed.error.issues[0]?.message}`);
  }

  const reply = parsed.data;
  if (reply.refused) {
    return {
      kind: 'refusal',
      message: reply.refusalMessage || 'This request is outside the data your role may access.',
    };
  }
  if (reply.needsClarification) {
    return {
      kind: 'clarification',
      message: reply.clarificationMessage || 'Could you please clarify your question?',
    };
  }
  const sql = reply.sql?.trim();
  if (!sql) {
    throw new GenerationError('Model reply contained no SQL');
  }
  return { kind: 'sql', sql, explanation: reply.explanation ?? '' };
}

// ---------------------------------------------------------------------------
// System prompt builder
// ---------------------------------------------------------------------------

/**
 * Prompt for one identity: role-filtered schema, the row filter the query
 * must respect and the reply format.
 */
export function buildSystemPrompt(
  catalog: SchemaCatalog,
  policy: AccessPolicy,
  identity: Identity,
  maxRows: number = MAX_ROWS,
): string {
  const visible = catalog.filterForRole(identity.role, policy.rbac);
  const rowFilter = renderRowFilter(identity, policy.rls);

  const rules = [
    'Generate ONLY a single SELECT statement (a WITH ... SELECT is fine). Never modify data or schema.',
    'Use only the tables and columns listed below. If the question needs anything else, refuse.',
    'Qualify columns with their table name or alias whenever more than one table is involved.',
    'Do not use comments, semicolons or system catalogues (pg_catalog, information_schema).',
    `Add LIMIT ${maxRows} unless the user asks for fewer rows.`,
    'If the question is ambiguous, ask for clarification instead of guessing.',
  ];
  if (rowFilter) {
    rules.push(`Every query must only return rows matching: ${rowFilter}`);
  }

  return `You convert questions into PostgreSQL queries for ${identity.displayName} (role: ${identity.role}).

RULES:
${rules.map((rule, i) => `${i + 1}. ${rule}`).join('\n')}

DATABASE SCHEMA (readable by this role):
${describeSchema(visible) || '-- (no tables)'}

Respond with a JSON object only:
{
  "sql": "SELECT ...",
  "explanation": "How to read the results",
  "needsClarification": false,
  "clarificationMessage": null,
  "refused": false,
  "refusalMessage": null
}`;
}

// ---------------------------------------------------------------------------
// Generator
// ---------------------------------------------------------------------------

export interface SqlGeneratorOptions {
  catalog: SchemaCatalog;
  policy: AccessPolicy;
  /** Defaults to the provider configured by the environment. */
  provider?: LLMProvider;
  maxRows?: number;
}

export class SqlGenerator {
  constructor(private readonly options: SqlGeneratorOptions) {}

  async generate(question: string, identity: Identity, signal?: AbortSignal): Promise<GeneratorOutcome> {
    const { catalog, policy, maxRows } = this.options;
    const provider = this.options.provider ?? getLLMProvider();

    const completion = await provider.complete({
      system: buildSystemPrompt(catalog, policy, identity, maxRows),
      userMessage: question,
      maxTokens: DEFAULT_MAX_TOKENS,
      signal,
    });
    return parseGeneratorReply(completion.text);
  }
}

// ---------------------------------------------------------------------------
// Question entry point
// ---------------------------------------------------------------------------

function hasSubject(identity: Identity | null | undefined): identity is Identity {
  return identity != null && String(identity.subjectId).trim() !== '';
}

export class Nl2SqlAgent {
  constructor(
    private readonly generator: Pick<SqlGenerator, 'generate'>,
    private readonly pipeline: Pick<QueryPipeline, 'processCandidate'>,
  ) {}

  /**
   * Answer a question end-to-end:
   *  1. Reject unauthenticated callers and invalid questions
   *  2. Ask the generator for a candidate statement
   *  3. Pass clarifications and refusals straight through
   *  4. Run the candidate through the query pipeline
   */
  async processQuestion(
    request: ChatRequest,
    identity: Identity | null | undefined,
    signal?: AbortSignal,
  ): Promise<ChatResponse> {
    if (!hasSubject(identity)) {
      return { status: 'unauthenticated', message: 'Authentication required.' };
    }

    const question = request.question.trim();
    if (!question) {
      return { status: 'invalid', message: 'Question must not be empty.' };
    }
    if (question.length > MAX_QUESTION_LENGTH) {
      return {
        status: 'invalid',
        message: `Question must be at most ${MAX_QUESTION_LENGTH} characters.`,
      };
    }

    let outcome: GeneratorOutcome;
    try {
      outcome = await this.generator.generate(question, identity, signal);
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[AGENT] SQL generation failed: ${message}`);
      return { status: 'error', kind: 'GenerationFailure', message };
    }

    switch (outcome.kind) {
      case 'clarification':
        return { status: 'clarification', message: outcome.message };
      case 'refusal':
        return { status: 'refusal', message: outcome.message };
      case 'sql': {
        const result = await this.pipeline.processCandidate(outcome.sql, identity, { signal });
        return result.status === 'ok' ? { ...result, explanation: outcome.explanation } : result;
      }
    }
  }
}
