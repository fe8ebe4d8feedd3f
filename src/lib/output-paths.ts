import type { RevdocConfig } from './config.js';
import { DOCUMENT_PROFILES, type DocumentType } from './document-types.js';

export interface OutputTarget {
  path?: string;
  /** Named on the command line or in config rather than a type default */
  explicit: boolean;
}

const VERSION_PLACEHOLDER = /\{VERSION\}/g;

/**
 * Target file for a document: --output-file, then `output.files.<type>` from
 * config, then the type's default file. `{VERSION}` expands to the version.
 */
export function resolveOutputTarget(
  documentType: DocumentType,
  version: string,
  config: Pick<RevdocConfig, 'output'>,
  override?: string
): OutputTarget {
  const configured = override ?? config.output.files[documentType];
  const path = configured ?? DOCUMENT_PROFILES[documentType].defaultFile;
  return {
    path: path?.replace(VERSION_PLACEHOLDER, version),
    explicit: configured !== undefined,
  };
}
