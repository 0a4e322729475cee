import { z } from 'zod';
import { ValidationError } from '../errors.js';
import type { Payload, SearchResult } from '../storage/types.js';
import { AXES } from './collections.js';
import type { Axis } from './collections.js';

// Stored payloads use snake_case keys; typed results use camelCase.

const MemoryPayloadSchema = z.object({
  category: z.string(),
  content: z.string(),
  importance: z.number().default(0),
  tags: z.array(z.string()).default([]),
  created_at: z.string(),
  verified_at: z.string().nullish(),
  verification_status: z.string().nullish(),
});

const CodePayloadSchema = z.object({
  project: z.string(),
  file_path: z.string(),
  language: z.string(),
  unit_type: z.string(),
  qualified_name: z.string(),
  code: z.string(),
  docstring: z.string().nullish(),
  line_start: z.number().int(),
  line_end: z.number().int(),
  created_at: z.string(),
});

const RootCauseSchema = z.object({
  category: z.string(),
  description: z.string(),
});

const LessonSchema = z.object({
  what_worked: z.string(),
  takeaway: z.string().nullish(),
});

const ExperiencePayloadSchema = z.object({
  ghap_id: z.string(),
  axis: z.enum(AXES),
  domain: z.string(),
  strategy: z.string(),
  goal: z.string(),
  hypothesis: z.string(),
  action: z.string(),
  prediction: z.string(),
  outcome_status: z.string(),
  outcome_result: z.string(),
  surprise: z.string().nullish(),
  root_cause: RootCauseSchema.nullish(),
  lesson: LessonSchema.nullish(),
  confidence_tier: z.string().nullish(),
  iteration_count: z.number().int().nonnegative(),
  created_at: z.string(),
});

const ValuePayloadSchema = z.object({
  axis: z.enum(AXES),
  cluster_id: z.string(),
  text: z.string(),
  member_count: z.number().int().nonnegative(),
  avg_confidence: z.number(),
  created_at: z.string(),
});

const CommitPayloadSchema = z.object({
  sha: z.string(),
  message: z.string(),
  author: z.string(),
  author_email: z.string(),
  // Epoch seconds so that date filters can use range operators
  committed_at: z.number(),
  files_changed: z.array(z.string()).default([]),
  created_at: z.string(),
});

interface ResultBase {
  id: string;
  score: number;
  createdAt: string;
  // Payload keys the variant does not model
  extra: Payload;
}

export interface MemoryResult extends ResultBase {
  kind: 'memory';
  category: string;
  content: string;
  importance: number;
  tags: string[];
  verifiedAt: string | null;
  verificationStatus: string | null;
}

export interface CodeResult extends ResultBase {
  kind: 'code';
  project: string;
  filePath: string;
  language: string;
  unitType: string;
  qualifiedName: string;
  code: string;
  docstring: string | null;
  lineStart: number;
  lineEnd: number;
}

export interface RootCause {
  category: string;
  description: string;
}

export interface Lesson {
  whatWorked: string;
  takeaway: string | null;
}

export interface ExperienceResult extends ResultBase {
  kind: 'experience';
  ghapId: string;
  axis: Axis;
  domain: string;
  strategy: string;
  goal: string;
  hypothesis: string;
  action: string;
  prediction: string;
  outcomeStatus: string;
  outcomeResult: string;
  surprise: string | null;
  rootCause: RootCause | null;
  lesson: Lesson | null;
  confidenceTier: string | null;
  iterationCount: number;
}

export interface ValueResult extends ResultBase {
  kind: 'value';
  axis: Axis;
  clusterId: string;
  text: string;
  memberCount: number;
  avgConfidence: number;
}

export interface CommitResult extends ResultBase {
  kind: 'commit';
  sha: string;
  message: string;
  author: string;
  authorEmail: string;
  // ISO-8601
  committedAt: string;
  filesChanged: string[];
}

export type TypedResult = MemoryResult | CodeResult | ExperienceResult | ValueResult | CommitResult;

export type ResultKind = TypedResult['kind'];

function parsePayload<S extends z.AnyZodObject>(
  schema: S,
  result: SearchResult,
  kind: ResultKind
): { data: z.infer<S>; extra: Payload } {
  const parsed = schema.safeParse(result.payload);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ValidationError(`Malformed ${kind} payload for record ${result.id}: ${issues}`, { cause: parsed.error });
  }

  const known = new Set(Object.keys(schema.shape));
  const extra: Payload = {};
  for (const [key, value] of Object.entries(result.payload)) {
    if (!known.has(key)) extra[key] = value;
  }
  return { data: parsed.data, extra };
}

export function toMemoryResult(result: SearchResult): MemoryResult {
  const { data, extra } = parsePayload(MemoryPayloadSchema, result, 'memory');
  return {
    kind: 'memory',
    id: result.id,
    score: result.score,
    createdAt: data.created_at,
    category: data.category,
    content: data.content,
    importance: data.importance,
    tags: data.tags,
    verifiedAt: data.verified_at ?? null,
    verificationStatus: data.verification_status ?? null,
    extra,
  };
}

export function toCodeResult(result: SearchResult): CodeResult {
  const { data, extra } = parsePayload(CodePayloadSchema, result, 'code');
  return {
    kind: 'code',
    id: result.id,
    score: result.score,
    createdAt: data.created_at,
    project: data.project,
    filePath: data.file_path,
    language: data.language,
    unitType: data.unit_type,
    qualifiedName: data.qualified_name,
    code: data.code,
    docstring: data.docstring ?? null,
    lineStart: data.line_start,
    lineEnd: data.line_end,
    extra,
  };
}

export function toExperienceResult(result: SearchResult): ExperienceResult {
  const { data, extra } = parsePayload(ExperiencePayloadSchema, result, 'experience');
  return {
    kind: 'experience',
    id: result.id,
    score: result.score,
    createdAt: data.created_at,
    ghapId: data.ghap_id,
    axis: data.axis,
    domain: data.domain,
    strategy: data.strategy,
    goal: data.goal,
    hypothesis: data.hypothesis,
    action: data.action,
    prediction: data.prediction,
    outcomeStatus: data.outcome_status,
    outcomeResult: data.outcome_result,
    surprise: data.surprise ?? null,
    rootCause: data.root_cause ?? null,
    lesson: data.lesson ? { whatWorked: data.lesson.what_worked, takeaway: data.lesson.takeaway ?? null } : null,
    confidenceTier: data.confidence_tier ?? null,
    iterationCount: data.iteration_count,
    extra,
  };
}

export function toValueResult(result: SearchResult): ValueResult {
  const { data, extra } = parsePayload(ValuePayloadSchema, result, 'value');
  return {
    kind: 'value',
    id: result.id,
    score: result.score,
    createdAt: data.created_at,
    axis: data.axis,
    clusterId: data.cluster_id,
    text: data.text,
    memberCount: data.member_count,
    avgConfidence: data.avg_confidence,
    extra,
  };
}

export function toCommitResult(result: SearchResult): CommitResult {
  const { data, extra } = parsePayload(CommitPayloadSchema, result, 'commit');
  return {
    kind: 'commit',
    id: result.id,
    score: result.score,
    createdAt: data.created_at,
    sha: data.sha,
    message: data.message,
    author: data.author,
    authorEmail: data.author_email,
    committedAt: new Date(data.committed_at * 1000).toISOString(),
    filesChanged: data.files_changed,
    extra,
  };
}
