/**
 * @fileoverview Extraction prompt: the spec's field list as instructions plus
 * the PDF itself as a file part.
 */

import type { CoreMessage } from 'ai';
import type { DocumentSpec, FieldSpec } from '../schemas/document-spec';

const TYPE_HINTS: Record<FieldSpec['type'], string> = {
  string: 'text',
  number: 'number, no currency symbols or thousands separators',
  boolean: 'true or false',
  date: 'ISO date YYYY-MM-DD',
  table: 'list of rows'
};

function describeField(field: FieldSpec): string {
  const parts = [`- ${field.key} (${TYPE_HINTS[field.type]}${field.required ? ', required' : ''})`];
  if (field.description) parts.push(`: ${field.description}`);
  if (field.columns) {
    parts.push(`; columns: ${field.columns.map((c) => `${c.key} (${TYPE_HINTS[c.type]})`).join(', ')}`);
  }
  return parts.join('');
}

export function buildExtractionPrompt(spec: DocumentSpec, document: Uint8Array): CoreMessage[] {
  const system = `You are a precise document extraction assistant.

Rules:
- Extract only what the document states. Never guess or compute values that are not printed.
- When a field is absent, set value = null, confidence = "low" and reason_code = "missing".
- reason_code: "explicit_label" when the value sits next to its label, "nearby_header" when it sits under a matching header, "inferred_layout" when only the layout implies it, "conflict" when the document gives more than one candidate.
- evidence_snippet: the shortest excerpt that shows the value, at most 120 characters, or null.
- Return JSON only, matching the provided schema.`;

  const instructions = [
    `Document type: ${spec.name}`,
    spec.instructions ? `Notes: ${spec.instructions}` : null,
    'Fields:',
    ...spec.fields.map(describeField)
  ]
    .filter((line): line is string => line !== null)
    .join('\n');

  return [
    { role: 'system', content: system },
    {
      role: 'user',
      content: [
        { type: 'text', text: instructions },
        { type: 'file', data: document, mimeType: 'application/pdf' }
      ]
    }
  ];
}
