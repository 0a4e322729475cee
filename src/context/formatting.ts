import type { Axis } from '../search/collections.js';
import type {
  CodeResult,
  CommitResult,
  ExperienceResult,
  MemoryResult,
  TypedResult,
  ValueResult,
} from '../search/results.js';
import type { Payload } from '../storage/types.js';
import type { ContextItem, ContextSource, ItemsBySource } from './types.js';

const COMMIT_FILES_SHOWN = 3;

export const SOURCE_TITLES: Record<ContextSource, string> = {
  memory: 'Memories',
  code: 'Code',
  experience: 'Experiences',
  value: 'Values',
  commit: 'Commits',
};

export const PREMORTEM_SECTIONS: ReadonlyArray<[Axis, string]> = [
  ['full', 'Common Failures'],
  ['strategy', 'Strategy Performance'],
  ['surprise', 'Unexpected Outcomes'],
  ['root_cause', 'Root Causes to Watch'],
];

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

export function formatMemory(result: MemoryResult): string {
  return `**Memory**: ${result.content}\n*Category: ${result.category}, Importance: ${result.importance.toFixed(2)}*`;
}

export function formatCode(result: CodeResult): string {
  let block = `**${capitalize(result.unitType)}** \`${result.qualifiedName}\` in \`${result.filePath}:${result.lineStart}\`\n`;
  block += `\`\`\`${result.language}\n${result.code}\n`;
  if (result.docstring) {
    block += `"""${result.docstring}"""\n`;
  }
  block += '```';
  return block;
}

export function formatExperience(result: ExperienceResult): string {
  let block = `**Experience**: ${result.domain} | ${result.strategy}\n`;
  block += `- **Goal**: ${result.goal}\n`;
  block += `- **Hypothesis**: ${result.hypothesis}\n`;
  block += `- **Action**: ${result.action}\n`;
  block += `- **Prediction**: ${result.prediction}\n`;
  block += `- **Outcome**: ${result.outcomeStatus} - ${result.outcomeResult}\n`;
  if (result.surprise) {
    block += `- **Surprise**: ${result.surprise}\n`;
  }
  if (result.lesson) {
    block += `- **Lesson**: ${result.lesson.whatWorked}\n`;
  }
  return block;
}

export function formatValue(result: ValueResult): string {
  return `**Value** (${result.axis}, cluster size: ${result.memberCount}):\n${result.text}`;
}

export function formatCommit(result: CommitResult): string {
  let block = `**Commit** \`${result.sha.slice(0, 7)}\` by ${result.author} on ${result.committedAt}\n`;
  block += `${result.message}\n`;

  const files = result.filesChanged;
  if (files.length > 0) {
    let fileList = files.slice(0, COMMIT_FILES_SHOWN).join(', ');
    if (files.length > COMMIT_FILES_SHOWN) {
      fileList += `, ... (${files.length - COMMIT_FILES_SHOWN} more)`;
    }
    block += `*Files: ${fileList}*`;
  }
  return block;
}

// Keys the deduplicator, truncation markers and premortem grouping read
function itemMetadata(result: TypedResult): Payload {
  const base: Payload = { ...result.extra, id: result.id };
  switch (result.kind) {
    case 'memory':
      return { ...base, category: result.category };
    case 'code':
      return { ...base, file_path: result.filePath, line_start: result.lineStart, qualified_name: result.qualifiedName };
    case 'experience':
      return { ...base, ghap_id: result.ghapId, axis: result.axis, domain: result.domain, strategy: result.strategy };
    case 'value':
      return { ...base, axis: result.axis, cluster_id: result.clusterId };
    case 'commit':
      return { ...base, sha: result.sha, author: result.author };
  }
}

function render(result: TypedResult): string {
  switch (result.kind) {
    case 'memory':
      return formatMemory(result);
    case 'code':
      return formatCode(result);
    case 'experience':
      return formatExperience(result);
    case 'value':
      return formatValue(result);
    case 'commit':
      return formatCommit(result);
  }
}

export function toContextItem(result: TypedResult): ContextItem {
  return {
    source: result.kind,
    content: render(result),
    relevance: result.score,
    metadata: itemMetadata(result),
  };
}

export function renderStandard(selected: ItemsBySource, order: readonly ContextSource[]): string {
  const sections = ['# Context\n'];
  let totalItems = 0;
  let sourceCount = 0;

  for (const source of order) {
    const items = selected[source] ?? [];
    if (items.length === 0) continue;

    sections.push(`\n## ${SOURCE_TITLES[source]}\n`);
    for (const item of items) {
      sections.push(`\n${item.content}\n`);
      totalItems++;
    }
    sourceCount++;
  }

  sections.push(`\n---\n*${totalItems} items from ${sourceCount} sources*`);
  return sections.join('\n');
}

export function renderPremortem(selected: ItemsBySource, domain: string, strategy?: string): string {
  let header = `# Premortem: ${domain || 'Unknown Domain'}`;
  if (strategy) {
    header += ` with ${strategy}`;
  }

  const sections = [`${header}\n`];
  const experiences = selected.experience ?? [];
  let experienceCount = 0;

  for (const [axis, title] of PREMORTEM_SECTIONS) {
    const axisItems = experiences.filter((item) => item.metadata.axis === axis);
    if (axisItems.length === 0) continue;

    sections.push(`\n## ${title}\n`);
    for (const item of axisItems) {
      sections.push(`\n${item.content}\n`);
      experienceCount++;
    }
  }

  const values = selected.value ?? [];
  if (values.length > 0) {
    sections.push('\n## Relevant Principles\n');
    for (const item of values) {
      sections.push(`\n${item.content}\n`);
    }
  }

  sections.push(`\n---\n*Based on ${experienceCount} past experiences*`);
  return sections.join('\n');
}
