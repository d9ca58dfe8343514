import {describe, it, expect} from 'vitest';
import * as functions from './index';

describe('Cloud Functions entry point', () => {
  it('exports the parseLog endpoint', () => {
    expect(typeof functions.parseLog).toBe('function');
  });
});
