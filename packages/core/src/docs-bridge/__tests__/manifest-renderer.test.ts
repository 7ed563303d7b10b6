/**
 * Tests for Manifest Renderer and content providers
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { hashContent } from '../../utils/hashing.js';
import { Logger } from '../../utils/logger.js';
import { StaticContentProvider, desiredContent } from '../content-provider.js';
import { ManifestContentProvider, parseManifest, renderManifestSections } from '../manifest-renderer.js';
import {
  createTempProject,
  expectBridgeError,
  expectBridgeErrorAsync,
  removeTempProject,
  writeProjectFile,
} from './helpers.js';

const MANIFEST = `version: 3
updated_at: 2026-10-01T12:00:00Z
program:
  id: PRG-1
  name: Platform
systems:
  - id: ingest
    name: Ingest
    purpose: Collects events | batches
    adr: ADR-001
    status: active
    dependencies: [store, queue]
    roadmap_phase: 2
adr:
  - id: ADR-001
    title: Use queues
    status: accepted
    date: 2026-09-01
    related_systems: [ingest]
`;

describe('renderManifestSections', () => {
  const sections = renderManifestSections(parseManifest(MANIFEST, 'architecture/manifest.yaml'));

  it('should render the program snapshot and systems table', () => {
    expect(sections.architecture_overview).toBe(
      [
        '## Program Snapshot',
        '',
        '- Program ID: PRG-1',
        '- Name: Platform',
        '- Version: 3',
        '- Updated: 2026-10-01T12:00:00Z',
        '',
        '## Systems',
        '',
        '| ID | Name | Purpose | ADR | RFC | Status | Dependencies | Roadmap Phase |',
        '| --- | --- | --- | --- | --- | --- | --- | --- |',
        '| ingest | Ingest | Collects events \\| batches | ADR-001 | - | active | store, queue | 2 |',
      ].join('\n')
    );
  });

  it('should render the ADR index with plain dates', () => {
    expect(sections.adr_index).toBe(
      [
        '| ADR | Title | Status | Date | Systems |',
        '| --- | --- | --- | --- | --- |',
        '| ADR-001 | Use queues | accepted | 2026-09-01 | ingest |',
      ].join('\n')
    );
  });

  it('should render an empty RFC index as a bare table header', () => {
    expect(sections.rfc_index).toBe('| RFC | Title | Status | Date | Systems |\n| --- | --- | --- | --- | --- |');
  });
});

describe('parseManifest', () => {
  it('should reject a manifest without a program', () => {
    const error = expectBridgeError(() => parseManifest('version: 1\n', 'm.yaml'));
    expect(error.code).toBe('DOC_BRIDGE_CONTENT_UNAVAILABLE');
    expect(error.message).toBe('m.yaml is not a valid architecture manifest');
    expect(error.details).toEqual({ issues: ['program: Required'] });
  });

  it('should reject invalid YAML', () => {
    expect(expectBridgeError(() => parseManifest('a: [', 'm.yaml')).code).toBe('DOC_BRIDGE_CONTENT_UNAVAILABLE');
  });
});

describe('ManifestContentProvider', () => {
  let root: string;
  const logger = new Logger({ level: 'silent' });

  beforeEach(async () => {
    root = await createTempProject();
  });

  afterEach(async () => {
    await removeTempProject(root);
  });

  it('should render known sections with a normalized hash', async () => {
    await writeProjectFile(root, 'architecture/manifest.yaml', MANIFEST);
    const provider = new ManifestContentProvider(join(root, 'architecture/manifest.yaml'), undefined, logger);

    const desired = await provider.render('rfc_index');
    expect(desired.hash).toBe(hashContent('| RFC | Title | Status | Date | Systems |\n| --- | --- | --- | --- | --- |'));
  });

  it('should refuse sections it does not render', async () => {
    const provider = new ManifestContentProvider(join(root, 'architecture/manifest.yaml'), undefined, logger);
    const error = await expectBridgeErrorAsync(() => provider.render('custom'));
    expect(error.code).toBe('DOC_BRIDGE_CONTENT_UNAVAILABLE');
    expect(error.section).toBe('custom');
  });

  it('should report a missing manifest', async () => {
    const provider = new ManifestContentProvider(join(root, 'architecture/manifest.yaml'), undefined, logger);
    const error = await expectBridgeErrorAsync(() => provider.render('adr_index'));
    expect(error.message).toBe('Architecture manifest architecture/manifest.yaml not found');
  });
});

describe('StaticContentProvider', () => {
  it('should hash normalized content', () => {
    const provider = new StaticContentProvider({ a: 'x\n' });
    expect(provider.render('a')).toEqual({ content: 'x\n', hash: hashContent('x') });
    expect(desiredContent('\nx').hash).toBe(hashContent('x'));
  });

  it('should fail for unregistered sections', () => {
    const provider = new StaticContentProvider().set('a', 'x');
    expect(provider.render('a').content).toBe('x');
    expect(expectBridgeError(() => provider.render('b')).code).toBe('DOC_BRIDGE_CONTENT_UNAVAILABLE');
  });
});
