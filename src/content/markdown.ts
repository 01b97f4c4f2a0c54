/**
 * Markdown renderings of records, for tool callers that ask for `format: "markdown"`.
 */

import {
  GovernanceZoneSchema,
  KIND_LABELS,
  listItems,
  type BestPractice,
  type GovernanceEntry,
  type KindedList,
  type KindedRecord,
  type Snippet,
  type Tip,
  type TroubleshootingGuide,
} from '../types/content.js';
import { TAG_DELIMITER } from './wire.js';

function renderBestPractice(item: BestPractice): string[] {
  return [
    `# ${item.title}`,
    '',
    `**Category**: ${item.category}`,
    `**Difficulty**: ${item.difficulty}`,
    '',
    `**Description**: ${item.description}`,
    '',
    `**Rationale**: ${item.rationale}`,
    '',
    `**Good example**: ${item.example_good}`,
    `**Bad example**: ${item.example_bad}`,
    '',
    `**Tags**: ${item.tags.join(TAG_DELIMITER)}`,
  ];
}

function renderSnippet(item: Snippet): string[] {
  return [
    `# ${item.title}`,
    '',
    `**Language**: ${item.language}`,
    `**Use case**: ${item.use_case}`,
    '',
    '```' + (item.language === 'any' ? '' : item.language),
    item.code,
    '```',
    '',
    `**Explanation**: ${item.explanation}`,
  ];
}

function renderTroubleshooting(item: TroubleshootingGuide): string[] {
  const lines = [`# ${item.title}`];
  if (item.symptoms.length > 0) {
    lines.push('', '**Symptoms**:', ...item.symptoms.map((s) => `- ${s}`));
  }
  if (item.causes.length > 0) {
    lines.push('', '**Possible causes**:', ...item.causes.map((c) => `- ${c}`));
  }
  if (item.resolution_steps.length > 0) {
    lines.push('', '**Resolution steps**:');
    for (const step of item.resolution_steps) {
      lines.push(`${step.step}. **${step.action}**: ${step.details}`);
    }
  }
  return lines;
}

function renderTip(item: Tip): string[] {
  const lines = [`# ${item.title}`, '', item.tip];
  if (item.why_it_matters) {
    lines.push('', `*Why it matters*: ${item.why_it_matters}`);
  }
  return lines;
}

function renderGovernance(item: GovernanceEntry): string[] {
  const lines = [
    `# ${item.display_name}`,
    '',
    `**Minimum zone required**: ${item.minimum_zone}`,
    '',
    '**Availability by zone**:',
  ];
  for (const zone of GovernanceZoneSchema.options) {
    const info = item.zones[zone];
    if (!info) continue;
    lines.push(`- **${zone.toUpperCase()}**: ${info.available ? 'Available' : 'Not available'}`);
    if (info.reason) {
      lines.push(`  - Reason: ${info.reason}`);
    }
    if (info.requirements.length > 0) {
      lines.push(`  - Requirements: ${info.requirements.join(', ')}`);
    }
  }
  if (item.justification_template) {
    lines.push('', '**Justification template**:', `> ${item.justification_template}`);
  }
  return lines;
}

function renderLines(item: KindedRecord): string[] {
  switch (item.kind) {
    case 'best-practices':
      return renderBestPractice(item.record);
    case 'snippets':
      return renderSnippet(item.record);
    case 'troubleshooting':
      return renderTroubleshooting(item.record);
    case 'tips':
      return renderTip(item.record);
    case 'governance':
      return renderGovernance(item.record);
  }
}

export function renderRecordMarkdown(item: KindedRecord): string {
  return renderLines(item).join('\n');
}

/**
 * Render a result list; each record is followed by the resource URI that returns it in full.
 */
export function renderListMarkdown(list: KindedList, total: number, uriFor: (item: KindedRecord) => string): string {
  if (total === 0) {
    return `No ${KIND_LABELS[list.kind]} records matched.`;
  }
  const sections = listItems(list).map((item) =>
    [...renderLines(item), '', `Resource URI: ${uriFor(item)}`].join('\n')
  );
  return [`Found ${total} ${KIND_LABELS[list.kind]} record(s).`, ...sections].join('\n\n');
}
