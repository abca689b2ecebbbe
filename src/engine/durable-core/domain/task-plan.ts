import { assertNever } from '../../../runtime/assert-never.js';
import type { PipelineStep } from './resume-resolver.js';

export type TaskStatus = 'pending' | 'in_progress' | 'completed';

export type PipelineTaskId =
  | 'validate-setup'
  | 'conduct-interview'
  | 'analyze-splits'
  | 'write-manifest'
  | 'confirm-splits'
  | 'create-directories'
  | 'generate-specs'
  | 'output-summary';

interface TaskDefinition {
  readonly id: PipelineTaskId;
  readonly subject: string;
  readonly description: string;
  readonly activeForm: string;
}

/**
 * Pipeline tasks in execution order. `write-manifest` runs inline after split
 * analysis and is never a resume point.
 */
export const PIPELINE_TASKS: readonly TaskDefinition[] = [
  {
    id: 'validate-setup',
    subject: 'Validate input and setup session',
    description: 'Validate the input file exists and is readable. Initialize session state.',
    activeForm: 'Setting up session',
  },
  {
    id: 'conduct-interview',
    subject: 'Conduct interview',
    description: 'Interview the user to understand project requirements and constraints.',
    activeForm: 'Interviewing user',
  },
  {
    id: 'analyze-splits',
    subject: 'Analyze splits',
    description: 'Analyze the requirements and propose how to split the project.',
    activeForm: 'Analyzing splits',
  },
  {
    id: 'write-manifest',
    subject: 'Discover dependencies and write manifest',
    description: 'Discover dependencies between splits and write project-manifest.md.',
    activeForm: 'Writing manifest',
  },
  {
    id: 'confirm-splits',
    subject: 'Confirm splits with user',
    description: 'Present the proposed splits to the user for confirmation or revision.',
    activeForm: 'Confirming splits',
  },
  {
    id: 'create-directories',
    subject: 'Create split directories',
    description: 'Create the splits/NN-name/ directories for each confirmed split.',
    activeForm: 'Creating directories',
  },
  {
    id: 'generate-specs',
    subject: 'Generate spec files',
    description: 'Generate spec.md files for each split directory.',
    activeForm: 'Generating specs',
  },
  {
    id: 'output-summary',
    subject: 'Output summary',
    description: 'Output a summary of the completed workflow.',
    activeForm: 'Outputting summary',
  },
];

export interface PlannedTask {
  /** 1-based; doubles as the task id and file name in the sink. */
  readonly position: number;
  readonly subject: string;
  readonly description: string;
  readonly activeForm: string;
  readonly status: TaskStatus;
  readonly blocks: readonly string[];
  readonly blockedBy: readonly string[];
}

export interface TaskPlanContext {
  readonly planningDir: string;
  readonly inputPath: string;
  readonly sessionId: string;
}

export function currentTaskFor(step: PipelineStep): PipelineTaskId {
  switch (step) {
    case 'interview':
      return 'conduct-interview';
    case 'split-analysis':
      return 'analyze-splits';
    case 'confirmation':
      return 'confirm-splits';
    case 'directory-creation':
      return 'create-directories';
    case 'spec-generation':
      return 'generate-specs';
    case 'complete':
      return 'output-summary';
    default:
      return assertNever(step);
  }
}

/**
 * Expected task list for a resolved step.
 *
 * Workflow tasks come first (positions 1..8), each blocked by its predecessor.
 * Context tasks follow; they carry session parameters in their subjects so the
 * agent can recover them after a context reset, and stay blocked by the
 * summary task until the end.
 */
export function buildTaskPlan(step: PipelineStep, ctx: TaskPlanContext): readonly PlannedTask[] {
  const current = PIPELINE_TASKS.findIndex((t) => t.id === currentTaskFor(step));

  const drafts: Array<Omit<PlannedTask, 'blocks' | 'blockedBy'> & { readonly dependsOn: readonly number[] }> = [];

  PIPELINE_TASKS.forEach((def, i) => {
    const status: TaskStatus = i < current ? 'completed' : i === current ? 'in_progress' : 'pending';
    drafts.push({
      position: i + 1,
      subject: def.subject,
      description: def.description,
      activeForm: def.activeForm,
      status,
      dependsOn: i === 0 ? [] : [i],
    });
  });

  const summaryPosition = PIPELINE_TASKS.length;
  const contextSubjects = [
    `planning_dir=${ctx.planningDir}`,
    `initial_file=${ctx.inputPath}`,
    `session_id=${ctx.sessionId}`,
  ];
  contextSubjects.forEach((subject, i) => {
    drafts.push({
      position: summaryPosition + i + 1,
      subject,
      description: 'Session context item',
      activeForm: 'Context',
      status: 'pending',
      dependsOn: [summaryPosition],
    });
  });

  return drafts.map(({ dependsOn, ...task }) => ({
    ...task,
    blockedBy: dependsOn.map(String),
    blocks: drafts.filter((d) => d.dependsOn.includes(task.position)).map((d) => String(d.position)),
  }));
}
