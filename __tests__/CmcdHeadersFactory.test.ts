import { describe, it, expect, vi } from 'vitest';
import { CmcdConfiguration } from '../src/cmcd/CmcdConfiguration';
import { CmcdHeadersFactory } from '../src/cmcd/CmcdHeadersFactory';
import { DefaultRequestConfig, RequestConfig } from '../src/cmcd/RequestConfig';
import { StaticRequestConfig } from '../src/cmcd/StaticRequestConfig';
import {
    CMCD,
    CMCDMode,
    CmcdCustomData,
    KEY_BITRATE,
    KEY_CMCD_OBJECT,
    KEY_CMCD_REQUEST,
    KEY_CMCD_SESSION,
    KEY_SESSION_ID
} from '../src/media/CMCD';

const STATE = { bitrateKbps: 3200, bufferLengthMs: 21300 };

function createFactory(requestConfig: RequestConfig = new DefaultRequestConfig(), params: { cmcd?: CMCD; cmcdMode?: CMCDMode } = {}) {
    return new CmcdHeadersFactory(new CmcdConfiguration('session-1', 'movie-42', requestConfig), params);
}

describe('CmcdHeadersFactory', () => {
    describe('options', () => {
        it('should default to full CMCD in headers', () => {
            const factory = createFactory();
            expect(factory.cmcd).toBe(CMCD.FULL);
            expect(factory.cmcdMode).toBe(CMCDMode.HEADER);
        });

        it('should reset options to their default on undefined', () => {
            const factory = createFactory(undefined, { cmcd: CMCD.SHORT, cmcdMode: CMCDMode.QUERY });
            expect(factory.cmcd).toBe(CMCD.SHORT);
            expect(factory.cmcdMode).toBe(CMCDMode.QUERY);
            factory.cmcd = undefined;
            factory.cmcdMode = undefined;
            expect(factory.cmcd).toBe(CMCD.FULL);
            expect(factory.cmcdMode).toBe(CMCDMode.HEADER);
        });
    });

    describe('createCmcdData', () => {
        it('should log every allowed key on full CMCD', () => {
            const factory = createFactory(new StaticRequestConfig({ maximumThroughputKbps: 15000 }));
            expect(factory.createCmcdData(STATE)).toEqual({
                bl: 21300,
                br: 3200,
                cid: 'movie-42',
                rtp: 15000,
                sid: 'session-1'
            });
        });

        it('should not log the maximum throughput when unset', () => {
            expect(createFactory().createCmcdData(STATE)).toEqual({
                bl: 21300,
                br: 3200,
                cid: 'movie-42',
                sid: 'session-1'
            });
        });

        it('should give the observed throughput to the request configuration', () => {
            const factory = createFactory(new StaticRequestConfig({ maximumThroughputKbps: throughputKbps => throughputKbps * 2 }));
            expect(factory.createCmcdData({ throughputKbps: 5000 }).rtp).toBe(10000);
        });

        it('should not log a computed maximum throughput without observed throughput', () => {
            const factory = createFactory(new StaticRequestConfig({ maximumThroughputKbps: throughputKbps => throughputKbps * 2 }));
            expect(factory.createCmcdData({})).toEqual({ cid: 'movie-42', sid: 'session-1' });
            expect(factory.createHttpRequestHeaders({ bitrateKbps: 3200 })['CMCD-Status']).toBeUndefined();
        });

        it('should not log a maximum throughput which is not a positive integer', () => {
            const factory = createFactory(
                new (class extends DefaultRequestConfig {
                    requestedMaximumThroughputKbps(throughputKbps: number): number {
                        return -throughputKbps;
                    }
                })()
            );
            expect(factory.createCmcdData({ throughputKbps: 5000 }).rtp).toBeUndefined();
        });

        it('should skip disallowed keys', () => {
            const factory = createFactory(new StaticRequestConfig({ disallowedKeys: [KEY_BITRATE, KEY_SESSION_ID] }));
            expect(factory.createCmcdData(STATE)).toEqual({ bl: 21300, cid: 'movie-42' });
        });

        it('should skip missing values and empty ids', () => {
            const factory = new CmcdHeadersFactory(new CmcdConfiguration('session-1', '', new DefaultRequestConfig()));
            expect(factory.createCmcdData({})).toEqual({ sid: 'session-1' });
        });

        it('should log only bitrate, buffer length and session id on short CMCD', () => {
            const factory = createFactory(new StaticRequestConfig({ maximumThroughputKbps: 15000 }), { cmcd: CMCD.SHORT });
            expect(factory.createCmcdData(STATE)).toEqual({ bl: 21300, br: 3200, sid: 'session-1' });
        });

        it('should log nothing when CMCD is disabled', () => {
            expect(createFactory(undefined, { cmcd: CMCD.NONE }).createCmcdData(STATE)).toEqual({});
        });
    });

    describe('createHttpRequestHeaders', () => {
        it('should dispatch keys in their header', () => {
            const factory = createFactory(new StaticRequestConfig({ maximumThroughputKbps: 15000 }));
            expect(factory.createHttpRequestHeaders(STATE)).toEqual({
                'CMCD-Object': 'br=3200',
                'CMCD-Request': 'bl=21300',
                'CMCD-Session': 'cid="movie-42",sid="session-1"',
                'CMCD-Status': 'rtp=15000'
            });
        });

        it('should append custom data after the keys of the header', () => {
            const factory = createFactory(
                new StaticRequestConfig({
                    customData: {
                        [KEY_CMCD_OBJECT]: 'com.example-tier=3',
                        [KEY_CMCD_SESSION]: 'com.example-player="1.2"'
                    }
                })
            );
            expect(factory.createHttpRequestHeaders(STATE)).toEqual({
                'CMCD-Object': 'br=3200,com.example-tier=3',
                'CMCD-Request': 'bl=21300',
                'CMCD-Session': 'cid="movie-42",sid="session-1",com.example-player="1.2"'
            });
        });

        it('should create a header for custom data alone', () => {
            const factory = createFactory(new StaticRequestConfig({ customData: { [KEY_CMCD_REQUEST]: 'com.example-retry' } }));
            expect(factory.createHttpRequestHeaders({ bitrateKbps: 3200 })['CMCD-Request']).toBe('com.example-retry');
        });

        it('should keep a colliding custom key untouched', () => {
            const factory = createFactory(
                new (class extends DefaultRequestConfig {
                    customData(): CmcdCustomData {
                        return { [KEY_CMCD_OBJECT]: 'br=1000' };
                    }
                })()
            );
            expect(factory.createHttpRequestHeaders(STATE)['CMCD-Object']).toBe('br=3200,br=1000');
        });

        it('should warn once about a custom key duplicating a logged key', () => {
            const factory = createFactory(
                new (class extends DefaultRequestConfig {
                    customData(): CmcdCustomData {
                        return { [KEY_CMCD_OBJECT]: 'br=1000,com.example-tier=3' };
                    }
                })()
            );
            const log = vi.spyOn(factory, 'log');
            factory.createHttpRequestHeaders(STATE);
            expect(log).toHaveBeenCalledTimes(1);
            expect(log).toHaveBeenCalledWith('Custom key br of CMCD-Object duplicates an allowed CMCD key');
        });

        it('should not warn about a custom key replacing a key not logged', () => {
            const customData = { [KEY_CMCD_OBJECT]: 'br=1000' };
            const disallowed = createFactory(new StaticRequestConfig({ disallowedKeys: [KEY_BITRATE], customData }));
            const withoutValue = createFactory(
                new (class extends DefaultRequestConfig {
                    customData(): CmcdCustomData {
                        return customData;
                    }
                })()
            );
            const disallowedLog = vi.spyOn(disallowed, 'log');
            const withoutValueLog = vi.spyOn(withoutValue, 'log');
            expect(disallowed.createHttpRequestHeaders(STATE)['CMCD-Object']).toBe('br=1000');
            expect(withoutValue.createHttpRequestHeaders({ bufferLengthMs: 21300 })['CMCD-Object']).toBe('br=1000');
            expect(disallowedLog).not.toHaveBeenCalled();
            expect(withoutValueLog).not.toHaveBeenCalled();
        });

        it('should skip custom data without any key', () => {
            const factory = createFactory(
                new (class extends DefaultRequestConfig {
                    customData(): CmcdCustomData {
                        return { [KEY_CMCD_OBJECT]: ' ', [KEY_CMCD_REQUEST]: ',' };
                    }
                })()
            );
            expect(factory.createHttpRequestHeaders(STATE)).toEqual({
                'CMCD-Object': 'br=3200',
                'CMCD-Request': 'bl=21300',
                'CMCD-Session': 'cid="movie-42",sid="session-1"'
            });
            expect(factory.createQueryValue({ bitrateKbps: 3200 })).toBe('br=3200,cid="movie-42",sid="session-1"');
        });

        it('should ignore custom data on short CMCD', () => {
            const factory = createFactory(new StaticRequestConfig({ customData: { [KEY_CMCD_REQUEST]: 'com.example-retry' } }), {
                cmcd: CMCD.SHORT
            });
            expect(factory.createHttpRequestHeaders({ bitrateKbps: 3200 })).toEqual({
                'CMCD-Object': 'br=3200',
                'CMCD-Session': 'sid="session-1"'
            });
        });

        it('should create no header when CMCD is disabled', () => {
            expect(createFactory(undefined, { cmcd: CMCD.NONE }).createHttpRequestHeaders(STATE)).toEqual({});
        });
    });

    describe('createQueryValue', () => {
        it('should encode every key followed by custom data', () => {
            const factory = createFactory(new StaticRequestConfig({ customData: { [KEY_CMCD_SESSION]: 'com.example-player="1.2"' } }));
            expect(factory.createQueryValue({ bitrateKbps: 3200 })).toBe('br=3200,cid="movie-42",sid="session-1",com.example-player="1.2"');
        });

        it('should be empty when CMCD is disabled', () => {
            expect(createFactory(undefined, { cmcd: CMCD.NONE }).createQueryValue(STATE)).toBe('');
        });
    });

    describe('finalizeRequest', () => {
        const url = new URL('https://cdn.example.com/video/1.m4s?token=abc');

        it('should set headers in header mode', () => {
            const headers = new Headers();
            const result = createFactory().finalizeRequest(url, headers, STATE);
            expect(result.href).toBe(url.href);
            expect(headers.get('CMCD-Object')).toBe('br=3200');
            expect(headers.get('CMCD-Request')).toBe('bl=21300');
            expect(headers.get('CMCD-Session')).toBe('cid="movie-42",sid="session-1"');
            expect(headers.has('CMCD-Status')).toBe(false);
        });

        it('should set the query parameter in query mode', () => {
            const headers = new Headers();
            const result = createFactory(undefined, { cmcdMode: CMCDMode.QUERY }).finalizeRequest(url, headers, { bitrateKbps: 3200 });
            expect(result.searchParams.get('token')).toBe('abc');
            expect(result.searchParams.get('CMCD')).toBe('br=3200,cid="movie-42",sid="session-1"');
            expect(headers.has('CMCD-Object')).toBe(false);
        });

        it('should keep the given URL intact', () => {
            createFactory(undefined, { cmcdMode: CMCDMode.QUERY }).finalizeRequest(url, new Headers(), STATE);
            expect(url.href).toBe('https://cdn.example.com/video/1.m4s?token=abc');
        });

        it('should not add an empty query parameter', () => {
            const result = createFactory(undefined, { cmcd: CMCD.NONE, cmcdMode: CMCDMode.QUERY }).finalizeRequest(url, new Headers(), STATE);
            expect(result.searchParams.has('CMCD')).toBe(false);
        });
    });
});
