// Plain-text rendering of artifacts, links, traces and reports for the CLI

import type { AnyArtifact } from '../../models/any-artifact.js';
import type { PlaybookPattern } from '../../models/playbook.js';
import type { LinkDisplay } from '../../services/link/link-service.js';
import type { TraceResult, TraceNode } from '../../services/graph/graph-service.js';
import type { ImpactReport, ImpactChecklist } from '../../services/impact/impact-service.js';
import type { VerifyReport, VerifyIssue } from '../../services/verify/verify-service.js';
import type { AuditEntry, FieldChange } from '../../services/audit/audit-service.js';
import type { TransitionOption } from '../../services/lifecycle/lifecycle-service.js';
import { SECTION_LAYOUTS, getSectionValues, isSectionEmpty } from '../../services/serialization/sections.js';

/**
 * Two-line summary used by `air list`
 */
export function formatArtifactSummary(artifact: AnyArtifact): string[] {
  const lines = [
    `  ${artifact.id} - ${artifact.title}`,
    `    Status: ${artifact.status} | Owner: ${artifact.owner}`
  ];
  if (artifact.tags.length > 0) {
    lines.push(`    Tags: ${artifact.tags.join(', ')}`);
  }
  return lines;
}

function typeDetails(artifact: AnyArtifact): string[] {
  switch (artifact.type) {
    case 'daa':
      return artifact.boundedContexts.map(
        c => `Bounded context: ${c.name} - ${c.responsibility}` +
          (c.aggregates.length > 0 ? ` (aggregates: ${c.aggregates.join(', ')})` : '')
      );
    case 'rfc':
      return artifact.signoffs.map(
        s => `Sign-off: ${s.name} (${s.role}) ${s.approved ? 'approved' : 'objected'} on ${s.date.toISOString().slice(0, 10)}`
      );
    case 'bolt':
      return [
        ...(artifact.assignee ? [`Assignee: ${artifact.assignee}`] : []),
        ...(artifact.estimate ? [`Estimate: ${artifact.estimate}`] : [])
      ];
    case 'postmortem':
      return [
        `Severity: ${artifact.severity}`,
        `Incident: ${artifact.incidentDate.toISOString().slice(0, 10)}`,
        ...(artifact.deployment ? [`Deployment: ${artifact.deployment}`] : [])
      ];
    default:
      return [];
  }
}

/**
 * Full view used by `air show`: header, type details and every section
 */
export function formatArtifactDetails(artifact: AnyArtifact): string[] {
  const lines = [
    `${artifact.type.toUpperCase()}: ${artifact.id}`,
    `Title: ${artifact.title}`,
    `Status: ${artifact.status}`,
    `Owner: ${artifact.owner}`,
    `Created: ${artifact.createdAt.toISOString()}`,
    `Updated: ${artifact.updatedAt.toISOString()}`
  ];
  if (artifact.tags.length > 0) {
    lines.push(`Tags: ${artifact.tags.join(', ')}`);
  }
  if (artifact.supersededBy) {
    lines.push(`Superseded by: ${artifact.supersededBy}`);
  }
  if (artifact.checksum) {
    lines.push(`Checksum: ${artifact.checksum.substring(0, 16)}...`);
  }
  lines.push(...typeDetails(artifact));

  const values = getSectionValues(artifact);
  for (const spec of SECTION_LAYOUTS[artifact.type]) {
    const value = values[spec.field];
    lines.push('', `--- ${spec.heading} ---`);
    if (isSectionEmpty(value)) {
      lines.push('(empty)');
    } else if (Array.isArray(value)) {
      value.forEach((item, i) => lines.push(`  ${i + 1}. ${item}`));
    } else {
      lines.push(value);
    }
  }
  return lines;
}

/**
 * One relationship in tree form
 */
export function formatLinkDisplay(link: LinkDisplay, indent: string = ''): string {
  const direction = link.direction === 'incoming' ? '←' : '→';
  return `${indent}${direction} [${link.linkType}] ${link.id} - ${link.title} (${link.type})`;
}

function formatTraceNode(node: TraceNode): string {
  return `${'  '.repeat(node.depth)}${node.id} - ${node.title} [${node.status}] (${node.linkType})`;
}

/**
 * Upstream and downstream trace of one artifact
 */
export function formatTrace(artifact: AnyArtifact, trace: TraceResult): string[] {
  const lines = [`${artifact.id} - ${artifact.title} [${artifact.status}]`, '', 'Upstream:'];
  lines.push(...(trace.upstream.length > 0 ? trace.upstream.map(formatTraceNode) : ['  (none)']));
  lines.push('', 'Downstream:');
  lines.push(...(trace.downstream.length > 0 ? trace.downstream.map(formatTraceNode) : ['  (none)']));
  return lines;
}

export function formatImpact(report: ImpactReport, checklist: ImpactChecklist): string[] {
  const lines = [
    `Impact of changing ${report.artifactId}`,
    `  Risk score: ${report.riskScore}/100`,
    `  Direct dependents: ${report.directDependents.join(', ') || 'none'}`,
    `  Transitive dependents: ${report.transitiveDependents.join(', ') || 'none'}`
  ];
  if (report.postmortems.length > 0) {
    lines.push(`  Post-mortems: ${report.postmortems.join(', ')}`);
  }
  if (checklist.tasks.length > 0) {
    lines.push('', 'Checklist:');
    for (const task of checklist.tasks) {
      lines.push(`  [${task.priority}] ${task.action}`);
    }
  }
  return lines;
}

function formatChange(field: string, change: FieldChange): string {
  return `${field}: ${JSON.stringify(change.old ?? null)} → ${JSON.stringify(change.new ?? null)}`;
}

/**
 * One audit entry, with its field changes indented below it
 */
export function formatAuditEntry(entry: AuditEntry): string[] {
  const lines = [`${entry.timestamp.toISOString()}  ${entry.action.padEnd(10)} ${entry.actor}`];
  for (const [field, change] of Object.entries(entry.changes ?? {})) {
    lines.push(`    ${formatChange(field, change)}`);
  }
  return lines;
}

function formatIssue(issue: VerifyIssue): string {
  const mark = issue.severity === 'error' ? '✗' : '⚠';
  const subject = issue.artifactId ?? issue.path ?? 'store';
  return `${mark} [${issue.kind}] ${subject}: ${issue.message}`;
}

export function formatVerifyReport(report: VerifyReport): string[] {
  return [
    ...report.issues.map(formatIssue),
    ...(report.issues.length > 0 ? [''] : []),
    `Checked ${report.checked} file(s): ${report.errors} error(s), ${report.warnings} warning(s)`
  ];
}

/**
 * Reachable statuses and the gates that currently block each one
 */
export function formatTransitionOptions(options: TransitionOption[]): string[] {
  if (options.length === 0) {
    return ['  (no further transitions)'];
  }
  return options.flatMap(option => [
    `  ${option.allowed ? '✓' : '✗'} ${option.to}`,
    ...option.failures.map(f => `      ${f.message}`)
  ]);
}

export function formatPattern(pattern: PlaybookPattern): string[] {
  const lines = [
    `${pattern.id}: ${pattern.name}`,
    `Owner: ${pattern.owner}`,
    `Learned from: ${pattern.sourcePostmortems.join(', ')}`
  ];
  if (pattern.tags.length > 0) {
    lines.push(`Tags: ${pattern.tags.join(', ')}`);
  }
  lines.push('', '--- Problem ---', pattern.problem, '', '--- Solution ---', pattern.solution);
  return lines;
}

/**
 * Comma-separated option value to a list; empty items dropped
 */
export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}
