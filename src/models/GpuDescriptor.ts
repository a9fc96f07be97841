/**
 * GPU Descriptor Model
 *
 * One row of the hardware table: a compute capability, the architecture
 * family it belongs to and the CUDA toolkit versions that can target it.
 */

import { z } from 'zod';
import { isValidVersion } from '../lib/version-utils.js';

export interface GpuDescriptor {
  /** Architecture family name (e.g., "Ampere") */
  readonly archName: string;

  /** Compute capability (e.g., "8.6"), unique across the table */
  readonly computeCapability: string;

  /** Oldest CUDA toolkit that supports this capability (inclusive) */
  readonly minCudaVersion: string;

  /** Newest CUDA toolkit that supports this capability (inclusive) */
  readonly maxCudaVersion: string;
}

const versionString = (field: string) =>
  z.string().refine(isValidVersion, { message: `${field} must be a dotted numeric version` });

export const GpuDescriptorSchema = z.object({
  archName: z.string().min(1).describe('Architecture family name'),
  computeCapability: versionString('computeCapability').describe('Compute capability, e.g. 8.6'),
  minCudaVersion: versionString('minCudaVersion').describe('Oldest supporting CUDA toolkit'),
  maxCudaVersion: versionString('maxCudaVersion').describe('Newest supporting CUDA toolkit')
});

export const GpuTableSchema = z.array(GpuDescriptorSchema);

/**
 * Freezes a descriptor so table rows cannot be mutated after load
 */
export function freezeGpuDescriptor(gpu: GpuDescriptor): GpuDescriptor {
  return Object.freeze({
    archName: gpu.archName,
    computeCapability: gpu.computeCapability,
    minCudaVersion: gpu.minCudaVersion,
    maxCudaVersion: gpu.maxCudaVersion
  });
}
