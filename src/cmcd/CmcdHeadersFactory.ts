/**
 * Copyright 2025 Ceeblue B.V.
 * This file is part of https://github.com/CeeblueTV/wrts-client which is released under GNU Affero General Public License.
 * See file LICENSE or go to https://spdx.org/licenses/AGPL-3.0-or-later.html for full license details.
 */

import { Loggable } from '@ceeblue/web-utils';
import { Cmcd, encodeCmcd, toCmcdHeaders } from '@svta/common-media-library/cmcd';
import {
    CMCD,
    CMCDMode,
    ICMCD,
    CMCD_HEADER_KEYS,
    CMCD_QUERY_PARAM,
    CmcdCustomData,
    RATE_UNSET,
    customDataKeys,
    isCmcdKey,
    isPositiveInteger
} from '../media/CMCD';
import { CmcdConfiguration } from './CmcdConfiguration';

/**
 * Playback state at the moment of a request
 */
export type CmcdRequestState = {
    /**
     * Encoded bitrate in kbps of the object being requested
     */
    bitrateKbps?: number;
    /**
     * Buffer length in milliseconds
     */
    bufferLengthMs?: number;
    /**
     * Throughput in kbps observed for the object being requested
     */
    throughputKbps?: number;
};

/**
 * CmcdHeadersFactory assembles the CMCD data of each outgoing request from a {@link CmcdConfiguration}
 * and the current playback state, and writes it in headers or in the query string.
 *
 * Custom data of the {@link RequestConfig} is appended only on {@link CMCD.FULL|'full'} CMCD.
 *
 * @example
 * const factory = new CmcdHeadersFactory(CmcdConfiguration.DEFAULT_FACTORY.createCmcdConfiguration({ mediaId: 'movie' }));
 * const headers = new Headers();
 * const url = factory.finalizeRequest(new URL('https://cdn.example.com/video/1.m4s'), headers, {
 *    bitrateKbps: 3200,
 *    bufferLengthMs: 21300
 * });
 * await fetch(url, { headers });
 */
export class CmcdHeadersFactory extends Loggable implements ICMCD {
    /**
     * {@inheritDoc ICMCD.cmcd}
     */
    get cmcd(): CMCD {
        return this._cmcd ?? CMCD.FULL;
    }

    /**
     * {@inheritDoc ICMCD.cmcd}
     */
    set cmcd(value: CMCD | undefined) {
        this._cmcd = value;
    }

    /**
     * {@inheritDoc ICMCD.cmcdMode}
     */
    get cmcdMode(): CMCDMode {
        return this._cmcdMode ?? CMCDMode.HEADER;
    }

    /**
     * {@inheritDoc ICMCD.cmcdMode}
     */
    set cmcdMode(value: CMCDMode | undefined) {
        this._cmcdMode = value;
    }

    /**
     * The bound CMCD configuration
     */
    get configuration(): CmcdConfiguration {
        return this._configuration;
    }

    private _configuration: CmcdConfiguration;
    private _cmcd?: CMCD;
    private _cmcdMode?: CMCDMode;

    /**
     * @param configuration CMCD configuration of the session
     * @param params.cmcd `'full'`, {@link CMCD} type
     * @param params.cmcdMode `'header'`, {@link CMCDMode} delivery method
     */
    constructor(configuration: CmcdConfiguration, params: { cmcd?: CMCD; cmcdMode?: CMCDMode } = {}) {
        super();
        this._configuration = configuration;
        this._cmcd = params.cmcd;
        this._cmcdMode = params.cmcdMode;
    }

    /**
     * Builds the CMCD data allowed for a request
     *
     * @param state playback state of the request
     */
    createCmcdData(state: CmcdRequestState = {}): Cmcd {
        const cmcd: Cmcd = {};
        if (this.cmcd === CMCD.NONE) {
            return cmcd;
        }
        const config = this._configuration;
        const full = this.cmcd === CMCD.FULL;
        // keys in alphabetical order
        if (state.bufferLengthMs != null && config.isBufferLengthLoggingAllowed()) {
            cmcd.bl = state.bufferLengthMs;
        }
        if (state.bitrateKbps != null && config.isBitrateLoggingAllowed()) {
            cmcd.br = state.bitrateKbps;
        }
        if (full && config.contentId && config.isContentIdLoggingAllowed()) {
            cmcd.cid = config.contentId;
        }
        if (full && config.isMaximumRequestThroughputLoggingAllowed()) {
            const rtp = config.requestConfig.requestedMaximumThroughputKbps(state.throughputKbps ?? RATE_UNSET);
            if (isPositiveInteger(rtp)) {
                cmcd.rtp = rtp;
            }
        }
        if (config.sessionId && config.isSessionIdLoggingAllowed()) {
            cmcd.sid = config.sessionId;
        }
        return cmcd;
    }

    /**
     * Builds the CMCD headers of a request, by header name
     *
     * @param state playback state of the request
     */
    createHttpRequestHeaders(state: CmcdRequestState = {}): Record<string, string> {
        const cmcd = this.createCmcdData(state);
        const headers: Record<string, string> = { ...toCmcdHeaders(cmcd) };
        for (const [header, value] of this._customData(cmcd)) {
            const current = headers[header];
            headers[header] = current ? current + ',' + value : value;
        }
        return headers;
    }

    /**
     * Builds the CMCD query value of a request, empty when there is nothing to log
     *
     * @param state playback state of the request
     */
    createQueryValue(state: CmcdRequestState = {}): string {
        const cmcd = this.createCmcdData(state);
        const values = [encodeCmcd(cmcd)];
        for (const [, value] of this._customData(cmcd)) {
            values.push(value);
        }
        return values.filter(value => value).join(',');
    }

    /**
     * Prepares a request with CMCD according to {@link cmcdMode}
     *
     * @param url URL of the request, kept intact
     * @param headers HTTP headers completed in {@link CMCDMode.HEADER|'header'} mode
     * @param state playback state of the request
     * @returns the finalized URL
     */
    finalizeRequest(url: URL, headers: Headers, state: CmcdRequestState = {}): URL {
        url = new URL(url);
        if (this.cmcdMode === CMCDMode.QUERY) {
            const value = this.createQueryValue(state);
            if (value) {
                url.searchParams.set(CMCD_QUERY_PARAM, value);
            }
        } else {
            for (const [header, value] of Object.entries(this.createHttpRequestHeaders(state))) {
                headers.set(header, value);
            }
        }
        return url;
    }

    /**
     * Custom data to append by header in emission order, only for full CMCD
     */
    private _customData(cmcd: Cmcd): Array<[string, string]> {
        const result: Array<[string, string]> = [];
        if (this.cmcd !== CMCD.FULL) {
            return result;
        }
        const customData: CmcdCustomData = this._configuration.requestConfig.customData();
        for (const header of CMCD_HEADER_KEYS) {
            const value = customData[header];
            const keys = value ? customDataKeys(value) : [];
            if (!value || !keys.length) {
                continue;
            }
            for (const key of keys) {
                if (isCmcdKey(key) && cmcd[key] != null) {
                    this.log(`Custom key ${key} of ${header} duplicates an allowed CMCD key`).warn();
                }
            }
            result.push([header, value]);
        }
        return result;
    }
}
