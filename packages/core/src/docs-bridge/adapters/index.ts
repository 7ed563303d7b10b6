/**
 * External Adapters
 *
 * One adapter per integration; sections in `mode: external` are routed here
 * instead of the marker writer.
 */

export { BaseExternalAdapter, isRecord } from './base-adapter.js';
export type { AdapterInspectInput, AdapterInspection, ExternalAdapter } from './base-adapter.js';
export { MkDocsNavAdapter } from './mkdocs-nav.js';
export type { MkDocsNavOptions } from './mkdocs-nav.js';
export { DocusaurusSidebarAdapter } from './docusaurus-sidebar.js';
export type { DocusaurusSidebarOptions } from './docusaurus-sidebar.js';
export { ConfluencePageAdapter, buildPayload, DEFAULT_MAX_PAYLOAD_BYTES } from './confluence-page.js';
export type { ConfluencePageOptions, ConfluencePagePayload } from './confluence-page.js';

import { ConfluencePageAdapter } from './confluence-page.js';
import { DocusaurusSidebarAdapter } from './docusaurus-sidebar.js';
import { MkDocsNavAdapter } from './mkdocs-nav.js';
import type { ExternalAdapter } from './base-adapter.js';
import type { AdapterKind } from '../types.js';

const ADAPTERS: Readonly<Record<AdapterKind, ExternalAdapter>> = Object.freeze({
  mkdocs_nav: new MkDocsNavAdapter(),
  docusaurus_sidebar: new DocusaurusSidebarAdapter(),
  confluence_page: new ConfluencePageAdapter(),
});

/**
 * Adapter instance for a kind
 */
export function getAdapter(kind: AdapterKind): ExternalAdapter {
  return ADAPTERS[kind];
}
