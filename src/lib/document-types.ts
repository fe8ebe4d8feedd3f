/**
 * Static per-document-type settings, including the table that resolves the
 * `auto` output mode. A plain lookup keeps the set of modes closed.
 */

export const DOCUMENT_TYPES = [
  'message',
  'summary',
  'changelog',
  'release-notes',
  'announcement',
  'document',
] as const;

export type DocumentType = (typeof DOCUMENT_TYPES)[number];

export const OUTPUT_MODES = ['auto', 'prepend', 'append', 'update', 'overwrite', 'none'] as const;

export type OutputMode = (typeof OUTPUT_MODES)[number];

export type ConcreteOutputMode = Exclude<OutputMode, 'auto'>;

export interface DocumentTypeProfile {
  /** Prompt template; `document` takes the user's --prompt-file instead */
  template?: string;
  /** `auto` resolves to this when no output file was named */
  autoMode: ConcreteOutputMode;
  /** `auto` resolves to this when --output-file was given */
  autoModeWithFile: ConcreteOutputMode;
  /** Used when neither config nor CLI names a file; may contain {VERSION} */
  defaultFile?: string;
  /** Heading written when `update` starts a new file */
  title?: string;
  /** Payload when the revision resolves to no commits */
  emptyPayload: string;
  temperature: number;
}

export const TEMPERATURE_CREATIVE = 0.9;
export const TEMPERATURE_FACTUAL = 0.7;

export const DOCUMENT_PROFILES: Record<DocumentType, DocumentTypeProfile> = {
  message: {
    template: 'message_prompt.md',
    autoMode: 'none',
    autoModeWithFile: 'overwrite',
    emptyPayload: 'No changes detected.',
    temperature: TEMPERATURE_CREATIVE,
  },
  summary: {
    template: 'final_summary_prompt.md',
    autoMode: 'none',
    autoModeWithFile: 'overwrite',
    emptyPayload: 'No changes to summarize.',
    temperature: TEMPERATURE_CREATIVE,
  },
  changelog: {
    template: 'changelog_prompt.md',
    autoMode: 'update',
    autoModeWithFile: 'update',
    defaultFile: 'CHANGELOG.md',
    title: 'Changelog',
    emptyPayload: '- No notable changes.',
    temperature: TEMPERATURE_FACTUAL,
  },
  'release-notes': {
    template: 'release_notes_prompt.md',
    autoMode: 'overwrite',
    autoModeWithFile: 'overwrite',
    defaultFile: 'RELEASE_NOTES.md',
    emptyPayload: 'No changes in this release.',
    temperature: TEMPERATURE_FACTUAL,
  },
  announcement: {
    template: 'announcement_prompt.md',
    autoMode: 'overwrite',
    autoModeWithFile: 'overwrite',
    defaultFile: 'ANNOUNCEMENT.md',
    emptyPayload: 'Nothing new to announce.',
    temperature: TEMPERATURE_CREATIVE,
  },
  document: {
    autoMode: 'none',
    autoModeWithFile: 'overwrite',
    emptyPayload: 'No changes detected.',
    temperature: TEMPERATURE_CREATIVE,
  },
};

export function isDocumentType(value: string): value is DocumentType {
  return (DOCUMENT_TYPES as readonly string[]).includes(value);
}

export function isOutputMode(value: string): value is OutputMode {
  return (OUTPUT_MODES as readonly string[]).includes(value);
}

/**
 * Resolve `auto` through the static table; concrete modes pass through.
 */
export function resolveOutputMode(
  mode: OutputMode,
  documentType: DocumentType,
  explicitFile: boolean
): ConcreteOutputMode {
  if (mode !== 'auto') {
    return mode;
  }
  const profile = DOCUMENT_PROFILES[documentType];
  return explicitFile ? profile.autoModeWithFile : profile.autoMode;
}
