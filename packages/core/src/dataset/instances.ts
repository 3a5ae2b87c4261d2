import path from 'path';
import fs from 'fs-extra';
import { z } from 'zod';
import { DatasetError } from '@faultline/shared';

const TestListSchema = z.union([z.string(), z.array(z.string())]);

/** One bug-injection task from a JSONL dataset. Unknown fields are kept. */
export const InstanceRecordSchema = z
  .object({
    instance_id: z.string().min(1),
    repo: z.string().optional(),
    /** Diff that injects the defect */
    patch: z.string(),
    FAIL_TO_PASS: TestListSchema.default([]),
    PASS_TO_PASS: TestListSchema.default([]),
  })
  .passthrough();

export type InstanceRecord = z.infer<typeof InstanceRecordSchema>;

export interface InstanceCoordinates {
  owner: string;
  repo: string;
  baseCommit: string;
}

/**
 * Splits `owner__repo.<commit>.<kind>` into its parts.
 *
 * @example
 * parseInstanceId('acme__widgets.1a2b3c4d.func_pm_remove_cond__x1')
 * // { owner: 'acme', repo: 'widgets', baseCommit: '1a2b3c4d' }
 */
export function parseInstanceId(instanceId: string): InstanceCoordinates {
  const segments = instanceId.split('.');
  const [qualified = '', baseCommit = ''] = segments;
  const separator = qualified.lastIndexOf('__');
  const repo = separator === -1 ? qualified : qualified.slice(separator + 2);
  const owner = separator === -1 ? '' : qualified.slice(0, separator);

  if (segments.length < 2 || !repo || !baseCommit) {
    throw new DatasetError(
      `Malformed instance id "${instanceId}": expected owner__repo.<commit>.<kind>`,
    );
  }
  return { owner, repo, baseCommit };
}

/** Local checkout of the instance's repository. */
export function instanceRepoDir(reposRoot: string, instanceId: string): string {
  return path.resolve(reposRoot, parseInstanceId(instanceId).repo);
}

/**
 * Returns the first record of the JSONL file at `datasetPath` whose `instance_id`
 * is `instanceId`.
 *
 * @throws DatasetError when the file is missing, a line is not JSON, the record
 *   is malformed, or no record matches
 */
export async function loadInstance(datasetPath: string, instanceId: string): Promise<InstanceRecord> {
  if (!(await fs.pathExists(datasetPath))) {
    throw new DatasetError(`Dataset file not found: ${datasetPath}`);
  }

  const lines = (await fs.readFile(datasetPath, 'utf8')).split('\n');
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;

    let item: unknown;
    try {
      item = JSON.parse(line);
    } catch (error) {
      throw new DatasetError(`Malformed JSON on line ${i + 1} of ${datasetPath}`, { cause: error });
    }
    if (typeof item !== 'object' || item === null || !('instance_id' in item)) continue;
    if (item.instance_id !== instanceId) continue;

    const result = InstanceRecordSchema.safeParse(item);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `- ${i.path.join('.')}: ${i.message}`).join('\n');
      throw new DatasetError(`Invalid record for ${instanceId} on line ${i + 1}:\n${issues}`);
    }
    return result.data;
  }

  throw new DatasetError(`Instance ${instanceId} not found in ${datasetPath}`);
}
