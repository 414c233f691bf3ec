import {describe, expect, it} from 'vitest';

import {AvrError, isTransientConnectError, toAvrError} from '../src';

const systemError = (code: string): Error => Object.assign(new Error(`connect ${code}`), {code});

describe('AvrError helpers', () => {
    it('classifies transient connect failures', () => {
        expect(isTransientConnectError(systemError('ECONNREFUSED'))).toBe(true);
        expect(isTransientConnectError(systemError('ENETUNREACH'))).toBe(true);
        expect(isTransientConnectError(systemError('ECONNRESET'))).toBe(true);
        expect(isTransientConnectError(systemError('EACCES'))).toBe(false);
        expect(isTransientConnectError(new Error('boom'))).toBe(false);
        expect(isTransientConnectError(new AvrError({
            message: 'timed out',
            domain: 'timeout',
            code: 'CONNECT_TIMEOUT',
        }))).toBe(true);
    });

    it('wraps unknown errors and keeps the socket code', () => {
        const wrapped = toAvrError(systemError('ECONNREFUSED'), 'transport', 'CONNECT_FAILED', {attempt: 1});

        expect(wrapped).toBeInstanceOf(AvrError);
        expect(wrapped).toMatchObject({
            name: 'AvrError',
            message: 'connect ECONNREFUSED',
            domain: 'transport',
            code: 'CONNECT_FAILED',
            systemCode: 'ECONNREFUSED',
        });
        expect(wrapped.details).toEqual({attempt: 1});
        expect(isTransientConnectError(wrapped)).toBe(true);
    });

    it('returns AvrError instances unchanged', () => {
        const existing = new AvrError({message: 'closed', domain: 'transport', code: 'PEER_CLOSED'});
        expect(toAvrError(existing, 'protocol', 'TRANSPORT_ERROR')).toBe(existing);
        expect(toAvrError('plain', 'protocol', 'TRANSPORT_ERROR').message).toBe('plain');
    });
});
