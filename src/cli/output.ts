// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * CLI Output
 *
 * Formatting of answers, sources and indexing summaries for the terminal.
 */

import chalk from 'chalk';
import type { IndexSummary } from '../app.js';
import type { QueryResult, RetrievedDocument } from '../rag/types.js';

/**
 * Describe where a retrieved chunk came from.
 */
export function formatSourceLabel(document: RetrievedDocument): string {
  const { metadata } = document.chunk;
  const page = typeof metadata.page === 'number' ? ` (page ${metadata.page + 1})` : '';
  return `${metadata.source}${page}`;
}

/**
 * List sources with their rank and score.
 */
export function formatSources(documents: RetrievedDocument[]): string {
  if (documents.length === 0) {
    return chalk.dim('No documents retrieved.');
  }

  const lines = [chalk.bold('Sources:')];
  for (const document of documents) {
    lines.push(
      `  [${document.rank}] ${formatSourceLabel(document)} ` +
      chalk.dim(`(score ${document.score.toFixed(3)})`)
    );
  }
  return lines.join('\n');
}

/**
 * Render a complete answer with latency and sources.
 */
export function formatAnswer(result: QueryResult, showSources = true): string {
  const lines = [
    chalk.bold('Answer:'),
    result.answer.trim(),
    '',
    chalk.dim(`Latency: ${result.latencySeconds.toFixed(2)}s, ${result.documents.length} documents retrieved`),
  ];
  if (showSources) {
    lines.push(formatSources(result.documents));
  }
  return lines.join('\n');
}

/**
 * Summarize a finished indexing run.
 */
export function formatIndexSummary(indexName: string, summary: IndexSummary): string {
  if (summary.documents === 0) {
    return chalk.yellow('No documents found to index.');
  }
  const seconds = (summary.report.durationMs / 1000).toFixed(2);
  return (
    chalk.green(`Indexed ${summary.documents} documents into ${indexName}`) +
    chalk.dim(` (${summary.chunks} chunks, ${summary.report.batches} batches, ${seconds}s)`)
  );
}

/**
 * Header shown when the interactive loop starts.
 */
export function formatChatBanner(mode: string, model: string): string {
  const rule = '='.repeat(60);
  return [
    rule,
    chalk.bold('Document Q&A System'),
    rule,
    chalk.dim(`Mode: ${mode} (${model})`),
    "Ask a question about your documents. Type 'quit' to exit.",
  ].join('\n');
}
