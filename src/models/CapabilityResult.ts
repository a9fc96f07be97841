/**
 * Capability resolution models
 */

import type { GpuDescriptor } from './GpuDescriptor.js';

/**
 * Lookups derived from the GPUs a toolkit version supports
 */
export interface ResolvedEnvironment {
  /** Toolkit version the environment was resolved for */
  readonly cudaVersion: string;

  /** Full table the environment was filtered from */
  readonly knownGpus: readonly GpuDescriptor[];

  /** GPUs supported by `cudaVersion`, in table order */
  readonly supportedGpus: readonly GpuDescriptor[];

  /** Compute capabilities of `supportedGpus`, in table order */
  readonly supportedCapabilities: readonly string[];

  /** "8.0" -> "Ampere" */
  readonly capabilityToName: ReadonlyMap<string, string>;

  /** "Ampere" -> ["8.0", "8.6", "8.7"] */
  readonly archNameToCapabilities: ReadonlyMap<string, readonly string[]>;
}

export interface CapabilityRequest {
  /** Capabilities to build for; the last one is treated as the newest */
  cudaCapabilities: readonly string[];

  /** Emit a virtual (PTX) target for the newest capability (default: true) */
  enableForwardCompat?: boolean;
}

export interface CapabilityResult {
  cudaCapabilities: string[];
  enableForwardCompat: boolean;

  /** E.g. "8.6+PTX" */
  forwardCapability: string;

  /** E.g. ["7.5", "8.6", "8.6+PTX"] */
  capabilitiesAndForward: string[];

  /** E.g. ["Turing", "Ampere"] */
  archNames: string[];

  /** E.g. ["sm_75", "sm_86"] */
  realArches: string[];

  /** E.g. ["compute_75", "compute_86"] */
  virtualArches: string[];

  /** E.g. ["sm_75", "sm_86", "compute_86"] */
  arches: string[];

  /** nvcc -gencode arguments */
  gencode: string[];
}

/**
 * Environment lookups plus the expansion of the effective request
 */
export interface ResolvedCapabilities extends CapabilityResult {
  cudaVersion: string;
  capabilityToName: Record<string, string>;
  archNameToCapabilities: Record<string, string[]>;
}

/**
 * Fields of CapabilityResult that the CLI can print on their own
 */
export const CAPABILITY_FIELDS = [
  'gencode',
  'arches',
  'realArches',
  'virtualArches',
  'archNames',
  'capabilitiesAndForward',
  'forwardCapability'
] as const;

export type CapabilityField = (typeof CAPABILITY_FIELDS)[number];

export function isCapabilityField(value: string): value is CapabilityField {
  return CAPABILITY_FIELDS.some(field => field === value);
}
