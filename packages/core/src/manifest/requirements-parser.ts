/**
 * Requirements Parser
 *
 * Parses the requirements.txt format accepted by pip into ordered entries.
 * Only syntax is checked here; whether a package actually resolves is
 * decided by the installer during provisioning.
 */

import { ManifestError } from './manifest-error';
import type { ManifestEntry, ParsedManifest, Requirement } from './manifest-types';

const NAME_PATTERN = /^[A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?/;
const VERSION_CLAUSE = /^(===|==|!=|~=|<=|>=|<|>)\s*[A-Za-z0-9.*+!_-]+$/;

/** Options that take a value, keyed by every spelling pip accepts */
const VALUE_OPTIONS: Record<string, string> = {
  '-r': '--requirement',
  '--requirement': '--requirement',
  '-c': '--constraint',
  '--constraint': '--constraint',
  '-e': '--editable',
  '--editable': '--editable',
  '-i': '--index-url',
  '--index-url': '--index-url',
  '--extra-index-url': '--extra-index-url',
  '-f': '--find-links',
  '--find-links': '--find-links',
  '--no-binary': '--no-binary',
  '--only-binary': '--only-binary',
  '--trusted-host': '--trusted-host',
};

const FLAG_OPTIONS = new Set(['--pre', '--prefer-binary', '--require-hashes', '--no-index']);

interface LogicalLine {
  line: number;
  text: string;
}

/**
 * Normalize a distribution name for comparison
 */
export function normalizePackageName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, '-');
}

/**
 * Join continuation lines, strip comments and collapse whitespace
 */
function toLogicalLines(content: string): LogicalLine[] {
  const physical = content.split(/\r?\n/);
  const logical: LogicalLine[] = [];
  let buffer = '';
  let startLine = 0;

  physical.forEach((raw, index) => {
    if (buffer === '') {
      startLine = index + 1;
    }
    if (raw.endsWith('\\')) {
      buffer += raw.slice(0, -1) + ' ';
      return;
    }
    buffer += raw;
    logical.push({ line: startLine, text: buffer });
    buffer = '';
  });
  if (buffer !== '') {
    logical.push({ line: startLine, text: buffer });
  }

  return logical
    .map(({ line, text }) => ({
      line,
      text: text.replace(/(^|\s)#.*$/, '').replace(/\s+/g, ' ').trim(),
    }))
    .filter(({ text }) => text.length > 0);
}

function parseOption(entry: LogicalLine, source: string): ManifestEntry {
  const [head, ...rest] = entry.text.split(' ');
  let flag = head;
  let value: string | undefined;

  const eq = head.indexOf('=');
  if (head.startsWith('--') && eq > 0) {
    flag = head.slice(0, eq);
    value = head.slice(eq + 1);
  } else if (!head.startsWith('--') && head.length > 2) {
    // -rbase.txt
    flag = head.slice(0, 2);
    value = head.slice(2);
  }

  if (FLAG_OPTIONS.has(flag)) {
    if (value !== undefined || rest.length > 0) {
      throw new ManifestError(`option ${flag} takes no value`, source, entry.line);
    }
    return { kind: 'option', line: entry.line, text: entry.text, option: flag };
  }

  const canonical = VALUE_OPTIONS[flag];
  if (!canonical) {
    throw new ManifestError(`unsupported option '${flag}'`, source, entry.line);
  }

  if (value === undefined) {
    value = rest.join(' ');
  } else if (rest.length > 0) {
    throw new ManifestError(`unexpected text after ${flag}`, source, entry.line);
  }
  if (!value) {
    throw new ManifestError(`option ${flag} requires a value`, source, entry.line);
  }

  switch (canonical) {
    case '--requirement':
      return { kind: 'include', line: entry.line, text: entry.text, path: value, constraint: false };
    case '--constraint':
      return { kind: 'include', line: entry.line, text: entry.text, path: value, constraint: true };
    case '--editable':
      return { kind: 'editable', line: entry.line, text: entry.text, target: value };
    default:
      return { kind: 'option', line: entry.line, text: entry.text, option: canonical, value };
  }
}

function parseSpecifier(spec: string, source: string, line: number): string {
  let body = spec.trim();
  if (body.startsWith('(') && body.endsWith(')')) {
    body = body.slice(1, -1).trim();
  }
  if (body === '') {
    return '';
  }
  const clauses = body.split(',').map(clause => clause.replace(/\s+/g, ''));
  for (const clause of clauses) {
    if (!VERSION_CLAUSE.test(clause)) {
      throw new ManifestError(`invalid version specifier '${clause}'`, source, line);
    }
  }
  return clauses.join(',');
}

function parseRequirement(entry: LogicalLine, source: string): Requirement {
  const hashes: string[] = [];
  const kept: string[] = [];
  for (const token of entry.text.split(' ')) {
    if (token.startsWith('--hash=')) {
      const hash = token.slice('--hash='.length);
      if (!/^[a-z0-9]+:[A-Fa-f0-9]+$/.test(hash)) {
        throw new ManifestError(`invalid hash '${hash}'`, source, entry.line);
      }
      hashes.push(hash);
    } else if (token.startsWith('--')) {
      throw new ManifestError(`unsupported per-requirement option '${token}'`, source, entry.line);
    } else {
      kept.push(token);
    }
  }
  const body = kept.join(' ');

  const nameMatch = NAME_PATTERN.exec(body);
  if (!nameMatch) {
    throw new ManifestError(`invalid requirement '${body}'`, source, entry.line);
  }
  const name = nameMatch[0];
  let rest = body.slice(name.length).trimStart();

  let extras: string[] = [];
  if (rest.startsWith('[')) {
    const close = rest.indexOf(']');
    if (close < 0) {
      throw new ManifestError(`unterminated extras in '${body}'`, source, entry.line);
    }
    extras = rest
      .slice(1, close)
      .split(',')
      .map(extra => extra.trim())
      .filter(extra => extra.length > 0);
    for (const extra of extras) {
      if (!NAME_PATTERN.test(extra) || NAME_PATTERN.exec(extra)?.[0] !== extra) {
        throw new ManifestError(`invalid extra '${extra}'`, source, entry.line);
      }
    }
    rest = rest.slice(close + 1).trimStart();
  }

  let url: string | undefined;
  let marker: string | undefined;
  let specifier = '';

  if (rest.startsWith('@')) {
    // Direct reference: the marker separator must be preceded by whitespace
    const markerAt = rest.search(/\s;/);
    url = (markerAt >= 0 ? rest.slice(1, markerAt) : rest.slice(1)).trim();
    if (markerAt >= 0) {
      marker = rest.slice(markerAt + 2).trim();
    }
    if (!url) {
      throw new ManifestError(`missing URL after '@' for ${name}`, source, entry.line);
    }
  } else {
    const markerAt = rest.indexOf(';');
    const spec = markerAt >= 0 ? rest.slice(0, markerAt) : rest;
    if (markerAt >= 0) {
      marker = rest.slice(markerAt + 1).trim();
    }
    specifier = parseSpecifier(spec, source, entry.line);
  }

  if (marker !== undefined && marker === '') {
    throw new ManifestError(`empty environment marker for ${name}`, source, entry.line);
  }

  const requirement: Requirement = {
    kind: 'requirement',
    line: entry.line,
    text: entry.text,
    name,
    normalizedName: normalizePackageName(name),
    extras,
    specifier,
    hashes,
  };
  if (url !== undefined) requirement.url = url;
  if (marker !== undefined) requirement.marker = marker;
  return requirement;
}

function isReference(text: string): boolean {
  return text.startsWith('.') || text.startsWith('/') || /^[a-z][a-z0-9+.-]*:\/\//i.test(text);
}

/**
 * Whether two requirements would both be handed to the installer
 *
 * Entries for one package may repeat behind different environment markers,
 * since at most one of them applies on a given host.
 */
export function isDuplicateRequirement(first: Requirement, second: Requirement): boolean {
  return first.normalizedName === second.normalizedName && first.marker === second.marker;
}

/**
 * Parse the contents of one requirements file
 *
 * @param content - File contents
 * @param source - Label for error messages
 * @throws ManifestError on the first malformed line or a duplicate requirement
 */
export function parseRequirements(content: string, source: string = 'requirements.txt'): ParsedManifest {
  const entries: ManifestEntry[] = [];
  const seen = new Map<string, Requirement[]>();

  for (const logical of toLogicalLines(content)) {
    if (logical.text.startsWith('-')) {
      entries.push(parseOption(logical, source));
      continue;
    }
    if (isReference(logical.text)) {
      entries.push({ kind: 'reference', line: logical.line, text: logical.text, target: logical.text });
      continue;
    }

    const requirement = parseRequirement(logical, source);
    const listed = seen.get(requirement.normalizedName) ?? [];
    const previous = listed.find(other => isDuplicateRequirement(other, requirement));
    if (previous) {
      throw new ManifestError(
        `duplicate requirement '${requirement.name}' (first listed on line ${previous.line})`,
        source,
        logical.line
      );
    }
    seen.set(requirement.normalizedName, [...listed, requirement]);
    entries.push(requirement);
  }

  return { source, entries };
}
