/**
 * Tests for the per-request tracing decision.
 */

import { describe, it, expect } from 'vitest';
import { resolveSampleRate, shouldTraceRequest } from '../../../src/core/tracing/sampling.js';

const always = (): number => 0;
const never = (): number => 0.999999;

describe('resolveSampleRate', () => {
    it('samples 20% in prod and everything elsewhere by default', () => {
        expect(resolveSampleRate('prod')).toBe(0.2);
        expect(resolveSampleRate('dev')).toBe(1.0);
        expect(resolveSampleRate('stg')).toBe(1.0);
    });

    it('clamps the override to [0, 1]', () => {
        expect(resolveSampleRate('prod', 1.7)).toBe(1);
        expect(resolveSampleRate('dev', -0.5)).toBe(0);
        expect(resolveSampleRate('prod', 0.5)).toBe(0.5);
    });

    it('ignores a non-finite override', () => {
        expect(resolveSampleRate('prod', Number.NaN)).toBe(0.2);
    });
});

describe('shouldTraceRequest', () => {
    it('never traces personal data without the PII flag', () => {
        expect(shouldTraceRequest(
            { appEnv: 'dev', userContextSummary: '유저 컨텍스트 요약:', sampleRate: 1, allowPii: false },
            always,
        )).toBe(false);
    });

    it('traces personal data when the PII flag is set', () => {
        expect(shouldTraceRequest(
            { appEnv: 'dev', userContextSummary: '유저 컨텍스트 요약:', allowPii: true },
            always,
        )).toBe(true);
    });

    it('never traces at rate 0 and always traces at rate 1', () => {
        const base = { appEnv: 'prod', userContextSummary: '', allowPii: false };
        expect(shouldTraceRequest({ ...base, sampleRate: 0 }, always)).toBe(false);
        expect(shouldTraceRequest({ ...base, sampleRate: 1 }, never)).toBe(true);
    });

    it('compares the draw against the prod default', () => {
        const input = { appEnv: 'prod', userContextSummary: '', allowPii: false };
        expect(shouldTraceRequest(input, () => 0.19)).toBe(true);
        expect(shouldTraceRequest(input, () => 0.2)).toBe(false);
    });

    it('traces every dev request by default', () => {
        expect(shouldTraceRequest({ appEnv: 'dev', userContextSummary: '', allowPii: false }, never)).toBe(true);
    });
});
