import { describe, expect, it } from 'vitest';
import { isEnvFlagSet } from '../../src/infra/env-flag.js';

describe('isEnvFlagSet', () => {
  it('accepts the usual truthy spellings', () => {
    expect(['1', 'true', ' YES ', 'on'].map(isEnvFlagSet)).toEqual([true, true, true, true]);
  });

  it('treats anything else as off', () => {
    expect([undefined, '', '0', 'false', 'enabled'].map(isEnvFlagSet)).toEqual([false, false, false, false, false]);
  });
});
