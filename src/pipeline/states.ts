import type { ArticleRecord } from '../storage/schema.js';

/**
 * パイプラインの状態（前進順）。
 * `abandoned` は再試行上限到達・バックエンドによる拒否で入る終端状態。
 */
export const PIPELINE_STATES = [
  'discovered',
  'fetched',
  'creating',
  'generating',
  'generated',
  'downloaded',
  'stored',
  'published',
  'abandoned',
] as const;

export type PipelineState = (typeof PIPELINE_STATES)[number];

// 試行回数を数える単位
export const STAGES = ['fetch', 'create', 'generate', 'download', 'store', 'publish'] as const;

export type Stage = (typeof STAGES)[number];

export const TERMINAL_STATES: ReadonlySet<PipelineState> = new Set<PipelineState>(['published', 'abandoned']);

// 有効な状態遷移（前進1段、またはabandoned）
export const STATE_TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  discovered: ['fetched', 'abandoned'],
  fetched: ['creating', 'abandoned'],
  creating: ['generating', 'abandoned'],
  generating: ['generated', 'abandoned'],
  generated: ['downloaded', 'abandoned'],
  downloaded: ['stored', 'abandoned'],
  stored: ['published', 'abandoned'],
  published: [],
  abandoned: [],
};

// 各状態から次に進むために実行するステージ
export const STAGE_FOR_STATE: Partial<Record<PipelineState, Stage>> = {
  discovered: 'fetch',
  fetched: 'create',
  creating: 'create',
  generating: 'generate',
  generated: 'download',
  downloaded: 'store',
  stored: 'publish',
};

// ジョブIDなしでは入れない状態
const REQUIRES_JOB_ID: ReadonlySet<PipelineState> = new Set<PipelineState>([
  'generating',
  'generated',
  'downloaded',
  'stored',
  'published',
]);

export class InvalidTransitionError extends Error {
  constructor(sourceId: string, from: PipelineState, to: PipelineState, detail?: string) {
    super(`不正な状態遷移です (${sourceId}): ${from} -> ${to}${detail ? ` (${detail})` : ''}`);
    this.name = 'InvalidTransitionError';
  }
}

export function isTerminal(state: PipelineState): boolean {
  return TERMINAL_STATES.has(state);
}

export function canTransition(from: PipelineState, to: PipelineState): boolean {
  return STATE_TRANSITIONS[from].includes(to);
}

/**
 * 遷移前のレコードと遷移後のレコードを検証する。
 * 1段飛ばし・後退・ジョブIDや保存先のない前進はすべて拒否する。
 */
export function assertTransition(before: ArticleRecord, after: ArticleRecord): void {
  const from = before.state;
  const to = after.state;

  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(before.sourceId, from, to);
  }
  if (REQUIRES_JOB_ID.has(to) && !after.generationJobId) {
    throw new InvalidTransitionError(before.sourceId, from, to, 'generationJobIdがありません');
  }
  if (before.generationJobId && after.generationJobId !== before.generationJobId) {
    throw new InvalidTransitionError(before.sourceId, from, to, 'generationJobIdは変更できません');
  }
  if ((to === 'stored' || to === 'published') && !after.artifactLocation) {
    throw new InvalidTransitionError(before.sourceId, from, to, 'artifactLocationがありません');
  }
}
