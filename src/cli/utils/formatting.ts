/**
 * Terminal and JSON rendering of batch results.
 */

import type { BatchReport, ProblemOutcome } from '../../modules/debate-runner/index.js'

export interface Column<Row> {
  header: string
  cell: (row: Row) => string
}

/**
 * Left-aligned columns joined by ` | `, with a `-+-` rule under the header.
 * Each column is as wide as its widest cell or header.
 */
export function formatTable<Row>(columns: readonly Column<Row>[], rows: readonly Row[]): string {
  const cells = rows.map((row) => columns.map((column) => column.cell(row)))
  const widths = columns.map((column, i) =>
    cells.reduce((width, line) => Math.max(width, (line[i] ?? '').length), column.header.length),
  )

  const renderLine = (values: readonly string[]): string =>
    values.map((value, i) => value.padEnd(widths[i] ?? value.length)).join(' | ')

  return [
    renderLine(columns.map((column) => column.header)),
    widths.map((width) => '-'.repeat(width)).join('-+-'),
    ...cells.map(renderLine),
  ].join('\n')
}

const DASH = '-'

const OUTCOME_COLUMNS: readonly Column<ProblemOutcome>[] = [
  { header: 'Problem', cell: (o) => o.problemId },
  { header: 'Status', cell: (o) => o.status },
  { header: 'Run', cell: (o) => o.runId ?? DASH },
  { header: 'Judge', cell: (o) => (o.status === 'completed' ? o.report.judgeId : DASH) },
  { header: 'Solvers', cell: (o) => (o.status === 'completed' ? o.report.solverIds.join(', ') : DASH) },
  {
    header: 'Refined',
    cell: (o) =>
      o.status === 'completed'
        ? `${String(o.report.refinements.length)}/${String(o.report.solverIds.length)}`
        : DASH,
  },
  { header: 'Error', cell: (o) => (o.status === 'failed' ? `${o.error.code}: ${o.error.message}` : '') },
]

/** One table row per problem, then `N completed, M failed` */
export function formatBatchReport(report: BatchReport): string {
  const table = formatTable(OUTCOME_COLUMNS, report.outcomes)
  return `${table}\n\n${String(report.completed)} completed, ${String(report.failed)} failed`
}

/** Envelope for every `--output-format json` payload */
export interface CLIJsonOutput<T> {
  /** ISO-8601 time the output was produced */
  timestamp: string
  version: string
  command: string
  data: T
}

export function buildJsonOutput<T>(command: string, data: T, version: string): CLIJsonOutput<T> {
  return { timestamp: new Date().toISOString(), version, command, data }
}
