/**
 * Intel plugin contract and report types.
 */

import type { ContentEntity, EntitySummary } from '../entities/types.js';
import type { IntelData, IntelValue } from '../types/json.js';

// ============================================================================
// Descriptors
// ============================================================================

/**
 * Plugin metadata as handed to `register()`. Omitted fields take defaults.
 */
export interface PluginDefinition {
  id: string;
  label: string;
  description?: string | null;
  /** Entity types the plugin applies to; empty means all */
  entityTypes?: readonly string[];
  weight?: number;
  /** Package or module that contributes the plugin */
  provider?: string;
  /** Registered factory to build instances with; defaults to `id` */
  factory?: string;
}

export interface PluginDescriptor {
  readonly id: string;
  readonly label: string;
  readonly description: string | null;
  readonly entityTypes: readonly string[];
  readonly weight: number;
  readonly provider: string;
  readonly factory: string;
}

/** Writable copy handed to descriptor alters. */
export type DescriptorDraft = { -readonly [K in keyof PluginDescriptor]: PluginDescriptor[K] };

export type DescriptorAlter = (descriptors: DescriptorDraft[]) => DescriptorDraft[] | void;

// ============================================================================
// Plugin instances
// ============================================================================

export interface IntelPlugin {
  readonly pluginId: string;

  /** False when an optional dependency is missing. Never throws. */
  isAvailable(): boolean;

  applies(entity: ContentEntity): boolean;

  /**
   * Gather data for the entity. Must not modify it.
   * An empty object means "nothing to contribute".
   */
  collect(entity: ContentEntity): IntelData | Promise<IntelData>;

  label(): string;
  description(): string | null;
  getWeight(): number;
}

export type PluginFactory = (descriptor: PluginDescriptor) => IntelPlugin;

export interface PluginRegistration {
  definition: PluginDefinition;
  factory: PluginFactory;
}

// ============================================================================
// Reports
// ============================================================================

export type FieldSnapshot = Record<string, IntelValue>;

export type IntelEntry =
  | { pluginLabel: string; data: IntelData; error?: never }
  | { pluginLabel: string; error: string; data?: never };

export interface IntelReport {
  entity: EntitySummary;
  fields: FieldSnapshot;
  intel: Record<string, IntelEntry>;
}

export type ReportAlter = (report: IntelReport, entity: ContentEntity) => IntelReport | void;

export type ExecutionMode = 'sequential' | 'parallel';

export interface CollectOptions {
  /** Field names to include; empty includes every populated field */
  fields?: readonly string[];
  /** Plugin ids to run; empty defers to the enabled-plugin allow-list */
  plugins?: readonly string[];
}

/** Catalogue row describing one plugin, available or not. */
export interface PluginInfo {
  id: string;
  label: string;
  description: string | null;
  provider: string;
  available: boolean;
  entityTypes: string[];
  weight: number;
}
