/**
 * Base Adapter
 *
 * Abstract base class for external section adapters. An adapter is a pure
 * transform from the current artifact text to the text it should have; the
 * orchestrator owns every read and write.
 */

import type { z } from 'zod';
import { DocsBridgeError } from '../errors.js';
import type { AdapterKind, DesiredContent, ExternalSectionConfig } from '../types.js';

export interface AdapterInspectInput {
  section: ExternalSectionConfig;
  /** Current artifact text, null when the file does not exist */
  current: string | null;
  /** Present when the adapter declares a content source */
  desired?: DesiredContent;
}

export type AdapterInspection =
  | { kind: 'match' }
  | { kind: 'drift'; next: string; summary: string }
  | { kind: 'missing_file'; next?: string }
  | { kind: 'corrupted'; reason: string };

export interface ExternalAdapter {
  readonly kind: AdapterKind;
  /** Whether repair may create the artifact when it does not exist */
  readonly createsTarget: boolean;
  /** Schema problems as `path: message` lines, empty when valid */
  validateOptions(options: Readonly<Record<string, unknown>>): string[];
  /** Section whose rendered content the adapter publishes, null if none */
  contentSource(section: ExternalSectionConfig): string | null;
  /** Project-relative artifact path used when the section declares no target */
  defaultTarget(section: ExternalSectionConfig, stateDir: string): string | undefined;
  inspect(input: AdapterInspectInput): AdapterInspection;
  /** Throws when `next` may not be written */
  assertWritable(section: ExternalSectionConfig, next: string, path: string): void;
}

export abstract class BaseExternalAdapter<Options> implements ExternalAdapter {
  abstract readonly kind: AdapterKind;
  abstract readonly createsTarget: boolean;
  protected abstract readonly schema: z.ZodType<Options, z.ZodTypeDef, unknown>;

  validateOptions(options: Readonly<Record<string, unknown>>): string[] {
    const result = this.schema.safeParse(options);
    if (result.success) {
      return [];
    }
    return result.error.errors.map((issue) => `options.${issue.path.join('.') || '<root>'}: ${issue.message}`);
  }

  contentSource(_section: ExternalSectionConfig): string | null {
    return null;
  }

  defaultTarget(_section: ExternalSectionConfig, _stateDir: string): string | undefined {
    return undefined;
  }

  inspect(input: AdapterInspectInput): AdapterInspection {
    return this.inspectWith(this.parseOptions(input.section), input);
  }

  assertWritable(_section: ExternalSectionConfig, _next: string, _path: string): void {
    // no artifact limits by default
  }

  protected abstract inspectWith(options: Options, input: AdapterInspectInput): AdapterInspection;

  /**
   * Options are validated when the registry loads; this only re-derives defaults
   */
  protected parseOptions(section: ExternalSectionConfig): Options {
    const result = this.schema.safeParse(section.options);
    if (!result.success) {
      throw new DocsBridgeError('DOC_BRIDGE_INVALID_CONFIG', `Invalid ${this.kind} options for section '${section.name}'`, {
        operation: 'inspect',
        section: section.name,
        details: { issues: this.validateOptions(section.options) },
      });
    }
    return result.data;
  }

  /**
   * Compare current text with the rendered next text
   */
  protected compare(current: string, next: string, summary: string): AdapterInspection {
    return current === next ? { kind: 'match' } : { kind: 'drift', next, summary };
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
