/**
 * Manifest Loader
 *
 * Reads a requirements file and every file it includes with `-r` or `-c`,
 * and computes the digest a provision record is keyed on. Comment-only
 * edits do not change the digest.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as crypto from 'crypto';
import { isDuplicateRequirement, parseRequirements } from './requirements-parser';
import { ManifestError } from './manifest-error';
import type { DependencyManifest, ParsedManifest, Requirement } from './manifest-types';

/**
 * Digest over normalized entries of one or more parsed manifests
 */
export function computeManifestDigest(manifests: ParsedManifest[]): string {
  const hash = crypto.createHash('sha256');
  for (const manifest of manifests) {
    hash.update(`# ${manifest.source}\n`);
    for (const entry of manifest.entries) {
      hash.update(`${entry.text}\n`);
    }
  }
  return hash.digest('hex');
}

/**
 * Load a manifest and its includes
 *
 * @param projectRoot - Directory manifest paths are reported relative to
 * @param manifestPath - Path to the top-level manifest, relative to projectRoot
 * @throws ManifestError if a file is missing or malformed, includes itself,
 *   or repeats a requirement already listed in another file
 */
export function loadManifest(projectRoot: string, manifestPath: string): DependencyManifest {
  const parsed: ParsedManifest[] = [];
  const requirements: Requirement[] = [];
  const files: string[] = [];
  const loading = new Set<string>();
  const sources: string[] = [];

  // Duplicates within one file are caught by the parser
  const collectRequirement = (requirement: Requirement, source: string): void => {
    const index = requirements.findIndex(other => isDuplicateRequirement(other, requirement));
    if (index >= 0) {
      throw new ManifestError(
        `duplicate requirement '${requirement.name}' (first listed in ${sources[index]}:${requirements[index].line})`,
        source,
        requirement.line
      );
    }
    requirements.push(requirement);
    sources.push(source);
  };

  const visit = (absolutePath: string, includedFrom: string | undefined, collect: boolean): void => {
    const relative = path.relative(projectRoot, absolutePath) || path.basename(absolutePath);
    if (loading.has(absolutePath)) {
      throw new ManifestError(`include cycle through ${relative}`, includedFrom ?? relative);
    }
    if (!fs.existsSync(absolutePath)) {
      throw new ManifestError(
        includedFrom ? `included file not found: ${relative}` : 'manifest not found',
        includedFrom ?? relative
      );
    }
    if (files.includes(relative)) {
      return;
    }

    loading.add(absolutePath);
    const manifest = parseRequirements(fs.readFileSync(absolutePath, 'utf-8'), relative);
    files.push(relative);
    parsed.push(manifest);

    for (const entry of manifest.entries) {
      if (entry.kind === 'requirement' && collect) {
        collectRequirement(entry, relative);
      } else if (entry.kind === 'include') {
        visit(path.resolve(path.dirname(absolutePath), entry.path), relative, collect && !entry.constraint);
      }
    }
    loading.delete(absolutePath);
  };

  visit(path.resolve(projectRoot, manifestPath), undefined, true);

  return {
    files,
    requirements,
    digest: computeManifestDigest(parsed),
  };
}

/**
 * Package names in manifest order, once each even when a package is listed
 * behind several environment markers
 */
export function requirementNames(manifest: DependencyManifest): string[] {
  const names = new Map<string, string>();
  for (const requirement of manifest.requirements) {
    if (!names.has(requirement.normalizedName)) {
      names.set(requirement.normalizedName, requirement.name);
    }
  }
  return [...names.values()];
}
