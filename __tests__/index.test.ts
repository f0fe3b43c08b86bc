import { describe, it, expect } from 'vitest';
import * as cmcd from '../index';

describe('package entry', () => {
    it('should expose the configuration model', () => {
        const config = cmcd.CmcdConfiguration.DEFAULT_FACTORY.createCmcdConfiguration({ mediaId: 'movie-42' });
        const factory = new cmcd.CmcdHeadersFactory(config, { cmcd: cmcd.CMCD.FULL });
        expect(factory.createCmcdData({ bitrateKbps: 3200 })).toEqual({ br: 3200, cid: 'movie-42', sid: config.sessionId });
    });

    it('should expose the header and key names', () => {
        expect([cmcd.KEY_CMCD_OBJECT, cmcd.KEY_CMCD_REQUEST, cmcd.KEY_CMCD_SESSION, cmcd.KEY_CMCD_STATUS]).toEqual(cmcd.CMCD_HEADER_KEYS);
        expect(cmcd.MAX_ID_LENGTH).toBe(64);
        expect(cmcd.CMCD_QUERY_PARAM).toBe('CMCD');
    });
});
