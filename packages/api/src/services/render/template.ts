/**
 * @fileoverview Layout templates for generated PDFs.
 *
 * A template is stored as JSON and referenced from jobs by `template_ref`.
 * Sections list labelled fields and tables whose values are read from the
 * structured record by dotted path:
 *
 * ```json
 * {
 *   "title": "Lease summary",
 *   "sections": [
 *     { "heading": "Parties", "fields": [{ "label": "Tenant", "path": "data.tenant" }] },
 *     { "heading": "Charges", "table": { "path": "data.charges", "columns": [
 *       { "label": "Item", "path": "label" }, { "label": "Amount", "path": "amount", "format": "currency" } ] } }
 *   ],
 *   "footer": "Generated automatically"
 * }
 * ```
 *
 * `layoutTemplate` resolves a template against a record into display lines;
 * drawing them is the renderer's job.
 */

import { z } from 'zod';

export const ValueFormatSchema = z.enum(['text', 'number', 'currency', 'date', 'percent']);
export type ValueFormat = z.infer<typeof ValueFormatSchema>;

const Path = z.string().trim().min(1).max(200);

const FieldLayoutSchema = z.object({
  label: z.string().min(1),
  path: Path,
  format: ValueFormatSchema.default('text')
});

const TableLayoutSchema = z.object({
  path: Path,
  columns: z.array(FieldLayoutSchema).min(1).max(8)
});

const SectionSchema = z
  .object({
    heading: z.string().min(1),
    fields: z.array(FieldLayoutSchema).optional(),
    table: TableLayoutSchema.optional()
  })
  .refine((section) => section.fields !== undefined || section.table !== undefined, {
    message: 'a section needs fields or a table'
  });

export const TemplateSchema = z.object({
  title: z.string().min(1),
  subtitle: z.string().optional(),
  pageSize: z.enum(['A4', 'LETTER']).default('A4'),
  /** ISO 4217 code for `currency` values */
  currency: z.string().length(3).default('USD'),
  sections: z.array(SectionSchema),
  footer: z.string().optional()
});
export type Template = z.infer<typeof TemplateSchema>;

export type ParseTemplateResult = { success: true; template: Template } | { success: false; issues: string[] };

export function parseTemplate(bytes: Uint8Array): ParseTemplateResult {
  let raw: unknown;
  try {
    raw = JSON.parse(new TextDecoder().decode(bytes));
  } catch {
    return { success: false, issues: ['template is not valid JSON'] };
  }
  const parsed = TemplateSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      success: false,
      issues: parsed.error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    };
  }
  return { success: true, template: parsed.data };
}

export const MISSING_VALUE = 'Not provided';

export type LayoutLine =
  | { kind: 'title'; text: string }
  | { kind: 'subtitle'; text: string }
  | { kind: 'heading'; text: string }
  | { kind: 'field'; label: string; value: string }
  | { kind: 'table'; columns: string[]; rows: string[][] }
  | { kind: 'footer'; text: string };

/** Read `a.b.0.c` out of nested objects and arrays. */
export function resolvePath(source: unknown, path: string): unknown {
  let current: unknown = source;
  for (const segment of path.split('.')) {
    if (Array.isArray(current)) {
      const index = Number(segment);
      current = Number.isInteger(index) ? current[index] : undefined;
    } else if (current !== null && typeof current === 'object') {
      current = Object.prototype.hasOwnProperty.call(current, segment) ? Reflect.get(current, segment) : undefined;
    } else {
      return undefined;
    }
  }
  return current;
}

export function formatValue(value: unknown, format: ValueFormat, currency = 'USD'): string {
  if (value === null || value === undefined || value === '') return MISSING_VALUE;
  if (typeof value === 'boolean') return value ? 'Yes' : 'No';
  if (typeof value === 'number' && Number.isFinite(value)) {
    switch (format) {
      case 'number':
        return new Intl.NumberFormat('en-US', { maximumFractionDigits: 2 }).format(value);
      case 'currency':
        return new Intl.NumberFormat('en-US', { style: 'currency', currency }).format(value);
      case 'percent':
        return `${(value * 100).toFixed(1)}%`;
      default:
        return String(value);
    }
  }
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
}

export function layoutTemplate(template: Template, record: Record<string, unknown>): LayoutLine[] {
  const lines: LayoutLine[] = [{ kind: 'title', text: template.title }];
  if (template.subtitle) lines.push({ kind: 'subtitle', text: template.subtitle });

  for (const section of template.sections) {
    lines.push({ kind: 'heading', text: section.heading });
    for (const field of section.fields ?? []) {
      lines.push({
        kind: 'field',
        label: field.label,
        value: formatValue(resolvePath(record, field.path), field.format, template.currency)
      });
    }
    if (section.table) {
      const { columns } = section.table;
      const source = resolvePath(record, section.table.path);
      const rows = Array.isArray(source)
        ? source.map((row: unknown) => columns.map((c) => formatValue(resolvePath(row, c.path), c.format, template.currency)))
        : [];
      lines.push({ kind: 'table', columns: columns.map((c) => c.label), rows });
    }
  }

  if (template.footer) lines.push({ kind: 'footer', text: template.footer });
  return lines;
}
