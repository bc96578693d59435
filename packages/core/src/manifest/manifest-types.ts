/**
 * Dependency manifest types (requirements.txt)
 */

export interface Requirement {
  kind: 'requirement';
  /** 1-based line the (possibly continued) entry starts on */
  line: number;
  /** Logical line with comments stripped and whitespace collapsed */
  text: string;
  name: string;
  /** Lowercase, with runs of `-`, `_` and `.` collapsed to `-` */
  normalizedName: string;
  extras: string[];
  /** Version clauses such as `>=2.0,<3`; empty when unconstrained */
  specifier: string;
  /** Direct reference after `@` */
  url?: string;
  /** Environment marker after `;` */
  marker?: string;
  hashes: string[];
}

export interface IncludeEntry {
  kind: 'include';
  line: number;
  text: string;
  path: string;
  /** `-c` constraints files restrict versions without adding requirements */
  constraint: boolean;
}

export interface EditableEntry {
  kind: 'editable';
  line: number;
  text: string;
  target: string;
}

/** A bare local path or archive URL */
export interface ReferenceEntry {
  kind: 'reference';
  line: number;
  text: string;
  target: string;
}

export interface OptionEntry {
  kind: 'option';
  line: number;
  text: string;
  option: string;
  value?: string;
}

export type ManifestEntry = Requirement | IncludeEntry | EditableEntry | ReferenceEntry | OptionEntry;

export interface ParsedManifest {
  /** Source label used in error messages, usually the file path */
  source: string;
  entries: ManifestEntry[];
}

/**
 * A manifest with every `-r`/`-c` include loaded
 */
export interface DependencyManifest {
  /** Manifest files in load order, relative to the project root */
  files: string[];
  /** Requirements from the manifest and its `-r` includes, in order */
  requirements: Requirement[];
  /** SHA-256 over the normalized entries of every file */
  digest: string;
}
