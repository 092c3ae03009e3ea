/**
 * Analysis task registry
 */

import type { AnalysisTask } from './types.js';

/**
 * Theme and pattern pairs analysed by default
 */
export const DEFAULT_PATTERNS: ReadonlyArray<{ themeId: string; patternId: string }> = [
  { themeId: 'theme1', patternId: 'appropriateness' },
  { themeId: 'theme1', patternId: 'emotional' },
  { themeId: 'theme1', patternId: 'judgemental' },
  { themeId: 'theme1', patternId: 'not_fact' },
  { themeId: 'theme1', patternId: 'relevant' },
  { themeId: 'theme1', patternId: 'tropes_context' },
  { themeId: 'theme1', patternId: 'tropes_grounded' },

  { themeId: 'theme2', patternId: 'adultification' },
  { themeId: 'theme2', patternId: 'judgemental' },
  { themeId: 'theme2', patternId: 'probative' },
  { themeId: 'theme2', patternId: 'risk' },
  { themeId: 'theme2', patternId: 'tropes' },
  { themeId: 'theme2', patternId: 'victim' },
];

export function taskIdFor(themeId: string, patternId: string): string {
  return `${themeId}-${patternId}`;
}

export const DEFAULT_TASKS: AnalysisTask[] = DEFAULT_PATTERNS.map(({ themeId, patternId }): AnalysisTask => ({
  taskId: taskIdFor(themeId, patternId),
  worker: { kind: 'critic-graph', themeId, patternId },
  saveResults: true,
}));

/**
 * Tasks for the requested ids, in request order; unknown ids are dropped.
 * No ids selects every task.
 */
export function resolveTasks(tasks: readonly AnalysisTask[], taskIds?: readonly string[]): AnalysisTask[] {
  if (!taskIds || taskIds.length === 0) {
    return [...tasks];
  }
  const byId = new Map(tasks.map((task) => [task.taskId, task]));
  return taskIds.flatMap((taskId) => {
    const task = byId.get(taskId);
    return task ? [task] : [];
  });
}
