import { MasterDocument, VersionSummary } from '../contracts'

const COLUMN_GAP = '  '

/**
 * Left-aligned plain-text table with a dashed rule under the header.
 */
export function renderTable(headers: string[], rows: string[][]): string {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map(row => (row[column] ?? '').length)))

  const renderRow = (cells: string[]): string =>
    widths.map((width, column) => (cells[column] ?? '').padEnd(width)).join(COLUMN_GAP).trimEnd()

  return [
    renderRow(headers),
    widths.map(width => '-'.repeat(width)).join(COLUMN_GAP),
    ...rows.map(renderRow),
  ].join('\n')
}

export function formatVersionTable(summaries: VersionSummary[]): string {
  return renderTable(
    ['Created', 'Base Name', 'Version', 'Changes', 'Lines', 'Meta Tag'],
    summaries.map(summary => [
      summary.displayTime,
      summary.baseName,
      summary.version,
      summary.change,
      String(summary.totalLines),
      // Tags may span lines; the table shows the first one
      summary.metaTag.split(/\r?\n/)[0],
    ])
  )
}

export function formatMasterTable(documents: MasterDocument[]): string {
  return renderTable(
    ['Modified', 'Name', 'Backups'],
    documents.map(document => [document.displayTime, document.name, String(document.backupCount)])
  )
}
