/**
 * Decides what happens when a downloaded record already exists locally
 */

import { NewsRecord, NewsRecordInput } from '../../database/models';

export type ConflictStrategy = 'serverWins' | 'clientWins' | 'merge';

export type ConflictResolution =
  | { action: 'write'; record: NewsRecordInput }
  | { action: 'skip'; reason: string };

export const resolveConflict = (
  remote: NewsRecordInput,
  local: NewsRecord | null,
  strategy: ConflictStrategy,
): ConflictResolution => {
  if (!local) {
    return { action: 'write', record: remote };
  }

  switch (strategy) {
    case 'serverWins':
      return { action: 'write', record: remote };
    case 'clientWins':
      return { action: 'skip', reason: 'Local copy kept' };
    case 'merge':
      // remote content, local user interaction
      return {
        action: 'write',
        record: { ...remote, isBookmarked: local.isBookmarked },
      };
  }
};
