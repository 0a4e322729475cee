import { nanoid } from 'nanoid';
import { ValidationError } from '../errors.js';
import type { EmbedderRegistry, EmbedderRole } from '../embedding/registry.js';
import { Collections, experienceCollection } from '../search/collections.js';
import type { Axis, CollectionName } from '../search/collections.js';
import type { ManagedVectorStore } from '../storage/managed.js';
import type { Payload } from '../storage/types.js';
import { silentLogger } from '../telemetry/logger.js';
import type { Logger } from '../telemetry/logger.js';

export type OutcomeStatus = 'confirmed' | 'falsified' | 'abandoned';

export type ConfidenceTier = 'gold' | 'silver' | 'bronze' | 'abandoned';

export interface MemoryInput {
  content: string;
  category: string;
  importance?: number;
  tags?: string[];
  id?: string;
}

export interface ExperienceEntry {
  id: string;
  sessionId?: string;
  domain: string;
  strategy: string;
  goal: string;
  hypothesis: string;
  action: string;
  prediction: string;
  outcome: {
    status: OutcomeStatus;
    result: string;
    capturedAt?: Date;
  };
  surprise?: string;
  rootCause?: { category: string; description: string };
  lesson?: { whatWorked: string; takeaway?: string };
  confidenceTier?: ConfidenceTier;
  iterationCount: number;
  createdAt?: Date;
}

export interface CommitInput {
  sha: string;
  message: string;
  author: string;
  authorEmail: string;
  committedAt: Date;
  filesChanged: string[];
}

export interface CodeUnitInput {
  project: string;
  filePath: string;
  language: string;
  unitType: string;
  qualifiedName: string;
  code: string;
  docstring?: string;
  lineStart: number;
  lineEnd: number;
}

function requireText(value: string, field: string): void {
  if (!value.trim()) {
    throw new ValidationError(`${field} must not be empty`);
  }
}

export function renderFullAxis(entry: ExperienceEntry): string {
  const lines = [
    `Goal: ${entry.goal}`,
    `Hypothesis: ${entry.hypothesis}`,
    `Action: ${entry.action}`,
    `Prediction: ${entry.prediction}`,
    `Outcome: ${entry.outcome.status} - ${entry.outcome.result}`,
  ];
  if (entry.surprise) lines.push(`Surprise: ${entry.surprise}`);
  if (entry.lesson?.whatWorked) lines.push(`Lesson: ${entry.lesson.whatWorked}`);
  return lines.join('\n');
}

export function renderStrategyAxis(entry: ExperienceEntry): string {
  const lines = [
    `Strategy: ${entry.strategy}`,
    `Applied to: ${entry.goal}`,
    `Outcome: ${entry.outcome.status} after ${entry.iterationCount} iteration(s)`,
  ];
  if (entry.lesson?.whatWorked) lines.push(`What worked: ${entry.lesson.whatWorked}`);
  return lines.join('\n');
}

export function renderSurpriseAxis(entry: ExperienceEntry, surprise: string, rootCause?: ExperienceEntry['rootCause']): string {
  const lines = [
    `Expected: ${entry.prediction}`,
    `Actual: ${entry.outcome.result}`,
    `Surprise: ${surprise}`,
  ];
  if (rootCause) lines.push(`Root cause: ${rootCause.category} - ${rootCause.description}`);
  return lines.join('\n');
}

export function renderRootCauseAxis(entry: ExperienceEntry, rootCause: NonNullable<ExperienceEntry['rootCause']>): string {
  return [
    `Category: ${rootCause.category}`,
    `Description: ${rootCause.description}`,
    `Context: ${entry.domain} - ${entry.strategy}`,
    `Original hypothesis: ${entry.hypothesis}`,
  ].join('\n');
}

/**
 * Axis texts for an experience. Full and strategy always apply; surprise and
 * root cause only for falsified outcomes, and root cause only alongside a
 * surprise.
 */
export function experienceAxes(entry: ExperienceEntry): Map<Axis, string> {
  const axes = new Map<Axis, string>([
    ['full', renderFullAxis(entry)],
    ['strategy', renderStrategyAxis(entry)],
  ]);

  if (entry.outcome.status === 'falsified' && entry.surprise) {
    axes.set('surprise', renderSurpriseAxis(entry, entry.surprise, entry.rootCause));
    if (entry.rootCause) {
      axes.set('root_cause', renderRootCauseAxis(entry, entry.rootCause));
    }
  }
  return axes;
}

/**
 * Write side of the engine: embeds text and upserts it into the standard
 * collections, materializing a collection the first time it is written.
 */
export class Recorder {
  private logger: Logger;
  private ensured = new Set<CollectionName>();

  constructor(
    private embedders: EmbedderRegistry,
    private store: ManagedVectorStore,
    logger: Logger = silentLogger
  ) {
    this.logger = logger.child({ component: 'recorder' });
  }

  async storeMemory(input: MemoryInput): Promise<string> {
    requireText(input.content, 'Memory content');
    const id = input.id ?? nanoid();

    await this.write(Collections.MEMORIES, 'semantic', id, input.content, {
      id,
      category: input.category,
      content: input.content,
      importance: input.importance ?? 0,
      tags: input.tags ?? [],
      created_at: new Date().toISOString(),
    });
    return id;
  }

  /** Persist one resolved experience into every applicable axis under the same id. */
  async persistExperience(entry: ExperienceEntry): Promise<Axis[]> {
    requireText(entry.goal, 'Experience goal');
    if (entry.rootCause && !entry.surprise && entry.outcome.status === 'falsified') {
      this.logger.warn('experience.root_cause_without_surprise', { ghapId: entry.id });
    }

    const base: Payload = {
      ghap_id: entry.id,
      session_id: entry.sessionId ?? null,
      created_at: (entry.createdAt ?? new Date()).toISOString(),
      captured_at: (entry.outcome.capturedAt ?? new Date()).getTime() / 1000,
      domain: entry.domain,
      strategy: entry.strategy,
      goal: entry.goal,
      hypothesis: entry.hypothesis,
      action: entry.action,
      prediction: entry.prediction,
      outcome_status: entry.outcome.status,
      outcome_result: entry.outcome.result,
      confidence_tier: entry.confidenceTier ?? null,
      iteration_count: entry.iterationCount,
    };
    if (entry.surprise) base.surprise = entry.surprise;
    if (entry.rootCause) {
      base.root_cause = { category: entry.rootCause.category, description: entry.rootCause.description };
    }
    if (entry.lesson) {
      base.lesson = { what_worked: entry.lesson.whatWorked, takeaway: entry.lesson.takeaway ?? null };
    }

    const persisted: Axis[] = [];
    for (const [axis, text] of experienceAxes(entry)) {
      await this.write(experienceCollection(axis), 'semantic', entry.id, text, { ...base, axis });
      persisted.push(axis);
    }

    this.logger.info('experience.persisted', { ghapId: entry.id, axes: persisted });
    return persisted;
  }

  async storeCommit(input: CommitInput): Promise<string> {
    requireText(input.message, 'Commit message');

    await this.write(Collections.COMMITS, 'semantic', input.sha, input.message, {
      sha: input.sha,
      message: input.message,
      author: input.author,
      author_email: input.authorEmail,
      committed_at: input.committedAt.getTime() / 1000,
      files_changed: input.filesChanged,
      created_at: new Date().toISOString(),
    });
    return input.sha;
  }

  async storeCodeUnit(input: CodeUnitInput): Promise<string> {
    requireText(input.code, 'Code');
    const id = `${input.project}:${input.filePath}:${input.qualifiedName}`;
    const text = input.docstring
      ? `${input.qualifiedName}\n${input.docstring}\n${input.code}`
      : `${input.qualifiedName}\n${input.code}`;

    await this.write(Collections.CODE, 'code', id, text, {
      project: input.project,
      file_path: input.filePath,
      language: input.language,
      unit_type: input.unitType,
      qualified_name: input.qualifiedName,
      code: input.code,
      docstring: input.docstring ?? null,
      line_start: input.lineStart,
      line_end: input.lineEnd,
      created_at: new Date().toISOString(),
    });
    return id;
  }

  private async write(
    collection: CollectionName,
    role: EmbedderRole,
    id: string,
    text: string,
    payload: Payload
  ): Promise<void> {
    const embedder = await this.embedders.get(role);
    const vector = await embedder.embed(text);

    if (!this.ensured.has(collection)) {
      await this.store.ensureCollection(collection);
      this.ensured.add(collection);
    }
    await this.store.upsert(collection, id, vector, payload);
    this.logger.debug('record.stored', { collection, id });
  }
}
