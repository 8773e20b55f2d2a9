import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { stringify as toCsv } from 'csv-stringify/sync';
import { stringify as toYaml } from 'yaml';
import type { Services } from '../services/index.js';
import { analyzeBatch } from '../engines/analyzer.js';
import { EXPORT_COLUMNS, toExportRow } from '../engines/explainability.js';
import { type ExportFormat, type ExportRow, ExportInputSchema } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { pickOverrides, thresholdProperties } from './analyze.js';
import { collectStatements, statementSourceProperties } from './batch.js';

/**
 * reqclarity_export - Analyze requirements and export a results table
 *
 * Nothing is recorded in the history; the table is the output.
 */
export const exportTool: Tool = {
  name: 'reqclarity_export',
  description: `Analyze requirements and export the results as a table.

## Formats

- **csv** - Requirement,Status,Severity,Tags,Reasons with a header row (default)
- **json** - Array of row objects
- **yaml** - Same rows as YAML

Tags are comma-separated and reasons are separated by " | " inside a single cell.

## Example

\`\`\`json
{ "texts": ["The UI should be user-friendly.", "The app must handle 500 users."], "format": "csv" }
\`\`\``,

  inputSchema: {
    type: 'object',
    properties: {
      ...statementSourceProperties,
      ...thresholdProperties,
      format: {
        type: 'string',
        enum: ['csv', 'json', 'yaml'],
        description: 'Export format (default: csv)',
      },
    },
  },
};

const MIME_TYPES: Record<ExportFormat, string> = {
  csv: 'text/csv',
  json: 'application/json',
  yaml: 'application/yaml',
};

export interface ExportResult {
  format: ExportFormat;
  mimeType: string;
  rowCount: number;
  content: string;
}

export function renderRows(rows: ExportRow[], format: ExportFormat): string {
  switch (format) {
    case 'csv':
      return toCsv(rows, { header: true, columns: [...EXPORT_COLUMNS] });
    case 'json':
      return JSON.stringify(rows, null, 2);
    case 'yaml':
      return toYaml(rows);
  }
}

export function handleExport(args: Record<string, unknown>, services: Pick<Services, 'analyzer'>): ExportResult {
  const input = ExportInputSchema.parse(args);
  const statements = collectStatements(input);
  const rows = analyzeBatch(services.analyzer, statements, pickOverrides(input)).map(toExportRow);

  logger.info('Analyses exported', { format: input.format, rows: rows.length });

  return {
    format: input.format,
    mimeType: MIME_TYPES[input.format],
    rowCount: rows.length,
    content: renderRows(rows, input.format),
  };
}
