import { readFileSync, existsSync, statSync } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { DefinitionError, errorMessage } from '../errors.js';
import { RESULT_TYPES, TestSuiteSchema, type TestSuite } from '../types/index.js';

const SUITE_EXTENSIONS = ['.yaml', '.yml'];

export interface LoadSuiteResult {
  suite: TestSuite;
  filePath: string;
}

type IssuePath = (string | number)[];

interface Problem {
  path: IssuePath;
  message: string;
}

/**
 * Load and validate a single suite file
 */
export function loadSuiteFile(filePath: string): LoadSuiteResult {
  if (!existsSync(filePath)) {
    throw new DefinitionError(`Test suite file not found: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new DefinitionError(`Invalid YAML in ${filePath}: ${errorMessage(error)}`);
  }

  const result = TestSuiteSchema.safeParse(raw);
  if (!result.success) {
    const errors = flattenIssues(result.error.issues, raw)
      .map((p) => `  - ${describePath(p.path, raw)}: ${p.message}`)
      .join('\n');
    throw new DefinitionError(`Invalid test suite ${filePath}:\n${errors}`);
  }

  return {
    suite: result.data,
    filePath,
  };
}

/**
 * Suite files at a location: the file itself, or the .yaml/.yml files
 * directly inside a directory, sorted by name
 */
export async function discoverSuiteFiles(location: string): Promise<string[]> {
  if (!existsSync(location)) {
    throw new DefinitionError(`Test location not found: ${location}`);
  }

  if (statSync(location).isFile()) {
    if (!isSuiteFile(location)) {
      throw new DefinitionError(`Test suite file must end in .yaml or .yml: ${location}`);
    }
    return [resolve(location)];
  }

  const entries = await readdir(location, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && isSuiteFile(entry.name))
    .map((entry) => resolve(location, entry.name))
    .sort();
}

function isSuiteFile(name: string): boolean {
  return SUITE_EXTENSIONS.includes(extname(name).toLowerCase());
}

/**
 * Replace union failures with the issues of the branch the input meant,
 * chosen by its result_type
 */
function flattenIssues(issues: z.ZodIssue[], raw: unknown): Problem[] {
  return issues.flatMap((issue): Problem[] => {
    if (issue.code !== z.ZodIssueCode.invalid_union) {
      return [{ path: issue.path, message: issue.message }];
    }

    const resultType = field(valueAt(raw, issue.path), 'result_type');
    const branch = RESULT_TYPES.findIndex((t) => t === resultType);
    const branchError = branch === -1 ? undefined : issue.unionErrors[branch];
    if (branchError) {
      return flattenIssues(branchError.issues, raw);
    }

    const expected = RESULT_TYPES.join(', ');
    return [
      {
        path: [...issue.path, 'result_type'],
        message:
          resultType === undefined
            ? `Required (one of ${expected})`
            : `Invalid value ${JSON.stringify(resultType)}; expected one of ${expected}`,
      },
    ];
  });
}

/**
 * Render an issue path with names: test case 1 (refine) → expected result 0 (cif_value/within) → min_value
 */
function describePath(path: IssuePath, raw: unknown): string {
  if (path.length === 0) return '(root)';

  const parts: string[] = [];
  let node = raw;
  for (let i = 0; i < path.length; i++) {
    const key = path[i];
    const next = path[i + 1];

    if (typeof next === 'number' && typeof key === 'string' && Object.hasOwn(LIST_LABELS, key)) {
      const item = valueAt(node, [key, next]);
      parts.push(`${LIST_LABELS[key]} ${next}${describeItem(key, item)}`);
      node = item;
      i++;
      continue;
    }

    parts.push(String(key));
    node = valueAt(node, [key]);
  }
  return parts.join(' → ');
}

const LIST_LABELS: Record<string, string> = {
  test_cases: 'test case',
  input_parameters: 'input parameter',
  expected_results: 'expected result',
  row_lookup: 'row lookup',
};

function describeItem(list: string, item: unknown): string {
  if (list === 'expected_results') {
    const resultType = field(item, 'result_type');
    const testType = field(item, 'test_type');
    const kind = [resultType, testType].filter((v) => typeof v === 'string').join('/');
    return kind ? ` (${kind})` : '';
  }
  const name = field(item, list === 'row_lookup' ? 'row_entry_name' : 'name');
  return typeof name === 'string' ? ` (${name})` : '';
}

function valueAt(root: unknown, path: IssuePath): unknown {
  let node = root;
  for (const key of path) {
    if (Array.isArray(node) && typeof key === 'number') {
      node = node[key];
    } else if (typeof node === 'object' && node !== null && !Array.isArray(node)) {
      node = field(node, String(key));
    } else {
      return undefined;
    }
  }
  return node;
}

function field(node: unknown, key: string): unknown {
  if (typeof node !== 'object' || node === null || Array.isArray(node)) return undefined;
  return Object.getOwnPropertyDescriptor(node, key)?.value;
}
