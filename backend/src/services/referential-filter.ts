import type { Logger } from '../logger.js';
import type { ReferentialRejection } from '../errors.js';

export type Partition<T> = {
  accepted: T[];
  rejected: T[];
  rejections: ReferentialRejection[];
};

type PartitionOptions<T> = {
  childId: (child: T) => number;
  parentId: (child: T) => number;
  logger?: Logger;
};

/**
 * Splits children by whether their parent id is in `validParentIds`.
 * Rejections are expected and never throw; each one is logged at warn.
 */
export function partition<T>(
  children: readonly T[],
  validParentIds: ReadonlySet<number>,
  { childId, parentId, logger }: PartitionOptions<T>
): Partition<T> {
  const result: Partition<T> = { accepted: [], rejected: [], rejections: [] };

  for (const child of children) {
    const parent = parentId(child);
    if (validParentIds.has(parent)) {
      result.accepted.push(child);
      continue;
    }

    const rejection = { childId: childId(child), parentId: parent };
    result.rejected.push(child);
    result.rejections.push(rejection);
    logger?.warn(rejection, 'child skipped: parent not extracted in this run');
  }

  return result;
}
