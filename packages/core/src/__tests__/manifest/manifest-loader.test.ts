import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as crypto from 'crypto';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { computeManifestDigest, loadManifest, requirementNames } from '../../manifest/manifest-loader';
import { parseRequirements } from '../../manifest/requirements-parser';

describe('@runbox/core - manifest-loader', () => {
  let projectRoot: string;

  const write = (name: string, content: string): void => {
    fs.mkdirSync(path.dirname(path.join(projectRoot, name)), { recursive: true });
    fs.writeFileSync(path.join(projectRoot, name), content);
  };

  beforeEach(() => {
    projectRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'runbox-manifest-'));
  });

  afterEach(() => {
    fs.rmSync(projectRoot, { recursive: true, force: true });
  });

  it('should follow includes and keep constraints out of the requirement list', () => {
    write('requirements.txt', '-r base.txt\n-c constraints.txt\nflask==2.0.0\n');
    write('base.txt', 'requests>=2\n');
    write('constraints.txt', 'urllib3<2\n');

    const manifest = loadManifest(projectRoot, 'requirements.txt');
    expect(manifest.files).toEqual(['requirements.txt', 'base.txt', 'constraints.txt']);
    expect(manifest.requirements.map(req => req.name)).toEqual(['requests', 'flask']);
  });

  it('should resolve includes relative to the including file', () => {
    write('reqs/main.txt', '-r common.txt\n');
    write('reqs/common.txt', 'click\n');

    const manifest = loadManifest(projectRoot, 'reqs/main.txt');
    expect(manifest.files).toEqual([path.join('reqs', 'main.txt'), path.join('reqs', 'common.txt')]);
    expect(manifest.requirements.map(req => req.name)).toEqual(['click']);
  });

  it('should load a file included twice only once', () => {
    write('requirements.txt', '-r a.txt\n-r b.txt\n');
    write('a.txt', '-r shared.txt\n');
    write('b.txt', '-r shared.txt\n');
    write('shared.txt', 'attrs\n');

    const manifest = loadManifest(projectRoot, 'requirements.txt');
    expect(manifest.files).toEqual(['requirements.txt', 'a.txt', 'shared.txt', 'b.txt']);
    expect(manifest.requirements).toHaveLength(1);
  });

  it('should reject a requirement repeated in an included file', () => {
    write('requirements.txt', '-r base.txt\nflask==2.1.0\n');
    write('base.txt', 'flask==2.0.0\n');

    expect(() => loadManifest(projectRoot, 'requirements.txt')).toThrow(
      "requirements.txt:2: duplicate requirement 'flask' (first listed in base.txt:1)"
    );
  });

  it('should allow a constraints file to name a requirement again', () => {
    write('requirements.txt', '-c constraints.txt\nflask\n');
    write('constraints.txt', 'flask<3\n');

    expect(loadManifest(projectRoot, 'requirements.txt').requirements.map(req => req.name)).toEqual(['flask']);
  });

  it('should name a package pinned behind several markers once', () => {
    write('requirements.txt', 'numpy==1.21.6; python_version < "3.8"\nflask\nnumpy==1.26.4; python_version >= "3.8"\n');

    const manifest = loadManifest(projectRoot, 'requirements.txt');
    expect(manifest.requirements).toHaveLength(3);
    expect(requirementNames(manifest)).toEqual(['numpy', 'flask']);
  });

  it('should ignore comment-only edits in the digest', () => {
    write('requirements.txt', 'flask==2.0.0\n');
    const before = loadManifest(projectRoot, 'requirements.txt').digest;

    write('requirements.txt', '# web\nflask==2.0.0   # pinned\n\n');
    expect(loadManifest(projectRoot, 'requirements.txt').digest).toBe(before);

    write('requirements.txt', 'flask==2.1.0\n');
    expect(loadManifest(projectRoot, 'requirements.txt').digest).not.toBe(before);
  });

  it('should hash the source label and each entry', () => {
    const expected = crypto
      .createHash('sha256')
      .update('# requirements.txt\nflask==2.0.0\n')
      .digest('hex');
    expect(computeManifestDigest([parseRequirements('flask==2.0.0')])).toBe(expected);
  });

  it('should report a missing manifest', () => {
    expect(() => loadManifest(projectRoot, 'requirements.txt')).toThrow('requirements.txt: manifest not found');
  });

  it('should report a missing include against the including file', () => {
    write('requirements.txt', '-r missing.txt\n');
    expect(() => loadManifest(projectRoot, 'requirements.txt')).toThrow(
      'requirements.txt: included file not found: missing.txt'
    );
  });

  it('should reject include cycles', () => {
    write('a.txt', '-r b.txt\n');
    write('b.txt', '-r a.txt\n');
    expect(() => loadManifest(projectRoot, 'a.txt')).toThrow('b.txt: include cycle through a.txt');
  });

  it('should accept an empty manifest', () => {
    write('requirements.txt', '');
    const manifest = loadManifest(projectRoot, 'requirements.txt');
    expect(manifest.requirements).toEqual([]);
    expect(manifest.files).toEqual(['requirements.txt']);
  });
});
