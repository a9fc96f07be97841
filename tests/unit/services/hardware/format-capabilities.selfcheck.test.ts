/**
 * Fixed-fixture check of formatCapabilities output.
 *
 * When changing token names or formats: pause, validate, and update the
 * expected value below.
 */

import { describe, it, expect } from 'vitest';
import type { GpuDescriptor } from '../../../../src/models/GpuDescriptor.js';
import type { ResolvedEnvironment } from '../../../../src/models/CapabilityResult.js';
import { buildLookups, formatCapabilities } from '../../../../src/services/hardware/CapabilityResolver.js';

const supportedGpus: GpuDescriptor[] = [
  { archName: 'Turing', computeCapability: '7.5', minCudaVersion: '10.0', maxCudaVersion: '12.0' },
  { archName: 'Ampere', computeCapability: '8.6', minCudaVersion: '11.2', maxCudaVersion: '12.0' }
];

function fixtureEnvironment(): ResolvedEnvironment {
  const lookups = buildLookups(supportedGpus)._unsafeUnwrap();
  return {
    cudaVersion: 'fixture',
    knownGpus: supportedGpus,
    supportedGpus,
    supportedCapabilities: supportedGpus.map(gpu => gpu.computeCapability),
    ...lookups
  };
}

describe('formatCapabilities self-check', () => {
  it('should produce the exact result for 7.5 and 8.6 with forward compatibility', () => {
    const result = formatCapabilities(fixtureEnvironment(), { cudaCapabilities: ['7.5', '8.6'] });

    expect(result._unsafeUnwrap()).toEqual({
      cudaCapabilities: ['7.5', '8.6'],
      enableForwardCompat: true,

      capabilitiesAndForward: ['7.5', '8.6', '8.6+PTX'],
      forwardCapability: '8.6+PTX',

      archNames: ['Turing', 'Ampere'],
      realArches: ['sm_75', 'sm_86'],
      virtualArches: ['compute_75', 'compute_86'],
      arches: ['sm_75', 'sm_86', 'compute_86'],

      gencode: [
        '-gencode=arch=compute_75,code=sm_75',
        '-gencode=arch=compute_86,code=sm_86',
        '-gencode=arch=compute_86,code=compute_86'
      ]
    });
  });
});
