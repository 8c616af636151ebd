/**
 * Access policy store.
 *
 * Loads role grants, row-filter templates, injection patterns and the
 * sensitive-column list from a YAML file. The result is validated with zod,
 * converted to Maps and Sets and frozen: nothing mutates it after startup.
 */

import fs from 'node:fs';
import * as yaml from 'js-yaml';
import { z } from 'zod';

import type { AccessPolicy, RbacPolicy, SensitiveColumnSet } from '../../shared/types';
import { DEFAULT_INJECTION_PATTERNS, USER_ID_PLACEHOLDER } from '../../shared/constants';
import { errorMessage, PolicyConfigError } from './errors';

const columnLists = z.record(z.string(), z.array(z.string().min(1)));

const PolicyFileSchema = z.object({
  rbac: z.record(z.string(), columnLists).default({}),
  row_filters: z
    .record(
      z.string(),
      z.string().refine((template) => template.includes(USER_ID_PLACEHOLDER), {
        message: `row filter must contain the ${USER_ID_PLACEHOLDER} placeholder`,
      }),
    )
    .default({}),
  injection_patterns: z.array(z.string().min(1)).default(DEFAULT_INJECTION_PATTERNS),
  sensitive_columns: columnLists.default({}),
});

export type PolicyFile = z.input<typeof PolicyFileSchema>;

function toSetMap(lists: Record<string, string[]>): Map<string, ReadonlySet<string>> {
  return new Map(Object.entries(lists).map(([table, columns]) => [table, new Set(columns)]));
}

function compilePattern(source: string): RegExp {
  try {
    return new RegExp(source, 'i');
  } catch (error) {
    throw new PolicyConfigError(`Invalid injection pattern /${source}/: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * Validate a parsed policy document and build the immutable policy.
 */
export function buildAccessPolicy(document: unknown): AccessPolicy {
  const parsed = PolicyFileSchema.safeParse(document ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new PolicyConfigError(`Invalid access policy: ${issues}`);
  }

  const file = parsed.data;
  const rbac: RbacPolicy = new Map(
    Object.entries(file.rbac).map(([role, tables]) => [role, toSetMap(tables)]),
  );
  const sensitiveColumns: SensitiveColumnSet = toSetMap(file.sensitive_columns);

  return Object.freeze({
    rbac,
    rls: new Map(Object.entries(file.row_filters)),
    injectionPatterns: Object.freeze(file.injection_patterns.map(compilePattern)),
    sensitiveColumns,
  });
}

/**
 * Read and validate the policy file at `path`.
 *
 * @throws PolicyConfigError when the file is missing, is not YAML or fails
 *         validation.
 */
export function loadAccessPolicy(path: string): AccessPolicy {
  let document: unknown;
  try {
    const raw = fs.readFileSync(path, 'utf8');
    document = yaml.load(raw);
  } catch (error) {
    throw new PolicyConfigError(`Failed to read access policy ${path}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  return buildAccessPolicy(document);
}
