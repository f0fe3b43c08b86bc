/**
 * Copyright 2025 Ceeblue B.V.
 * This file is part of https://github.com/CeeblueTV/wrts-client which is released under GNU Affero General Public License.
 * See file LICENSE or go to https://spdx.org/licenses/AGPL-3.0-or-later.html for full license details.
 */

/**
 * The CMCD type with 'full' or 'short' sending informations
 * or 'none' to disable CMCD
 */
export enum CMCD {
    NONE = 'none',
    SHORT = 'short', // br, bl and sid only
    FULL = 'full'
}

/**
 * The CMCD delivery method, 'header' to send the CMCD in the headers
 * or 'query' to send it in the query string
 */
export enum CMCDMode {
    HEADER = 'header',
    QUERY = 'query'
}

/**
 * Maximum length for ID fields
 */
export const MAX_ID_LENGTH = 64;

/**
 * Value returned by {@link RequestConfig.requestedMaximumThroughputKbps} when the maximum throughput
 * is unknown, in which case it is not logged upstream
 */
export const RATE_UNSET = -2147483647;

/**
 * Name of the query parameter carrying CMCD data in {@link CMCDMode.QUERY|'query'} mode
 */
export const CMCD_QUERY_PARAM = 'CMCD';

/**
 * Header keys SHOULD be allocated to one of the four defined header names based upon their
 * expected level of variability:
 * - CMCD-Object: keys whose values vary with the object being requested.
 * - CMCD-Request: keys whose values vary with each request.
 * - CMCD-Session: keys whose values are expected to be invariant over the life of the session.
 * - CMCD-Status: keys whose values do not vary with every request or object.
 */
export const KEY_CMCD_OBJECT = 'CMCD-Object';
export const KEY_CMCD_REQUEST = 'CMCD-Request';
export const KEY_CMCD_SESSION = 'CMCD-Session';
export const KEY_CMCD_STATUS = 'CMCD-Status';

export type CmcdHeaderKey = typeof KEY_CMCD_OBJECT | typeof KEY_CMCD_REQUEST | typeof KEY_CMCD_SESSION | typeof KEY_CMCD_STATUS;

/**
 * Header keys in their emission order
 */
export const CMCD_HEADER_KEYS: ReadonlyArray<CmcdHeaderKey> = [KEY_CMCD_OBJECT, KEY_CMCD_REQUEST, KEY_CMCD_SESSION, KEY_CMCD_STATUS];

export const KEY_BITRATE = 'br';
export const KEY_BUFFER_LENGTH = 'bl';
export const KEY_CONTENT_ID = 'cid';
export const KEY_SESSION_ID = 'sid';
export const KEY_MAXIMUM_REQUESTED_BITRATE = 'rtp';

export type CmcdKey =
    | typeof KEY_BITRATE
    | typeof KEY_BUFFER_LENGTH
    | typeof KEY_CONTENT_ID
    | typeof KEY_SESSION_ID
    | typeof KEY_MAXIMUM_REQUESTED_BITRATE;

/**
 * Header each well-known key belongs to
 */
export const CMCD_KEY_HEADERS: ReadonlyMap<CmcdKey, CmcdHeaderKey> = new Map<CmcdKey, CmcdHeaderKey>([
    [KEY_BITRATE, KEY_CMCD_OBJECT],
    [KEY_BUFFER_LENGTH, KEY_CMCD_REQUEST],
    [KEY_CONTENT_ID, KEY_CMCD_SESSION],
    [KEY_SESSION_ID, KEY_CMCD_SESSION],
    [KEY_MAXIMUM_REQUESTED_BITRATE, KEY_CMCD_STATUS]
]);

/**
 * Custom data by header key, every value is a comma-separated list of `key=value` or bare `key` tokens
 *
 * @example
 * {
 *     'CMCD-Request': 'customField1=25400',
 *     'CMCD-Object': 'customField2=3200,customField3=4004,customField4=v',
 *     'CMCD-Status': 'customField6,customField7=15000',
 *     'CMCD-Session': 'customField8="6e2fb550-c457-11e9-bb97-0800200c9a66"'
 * }
 */
export type CmcdCustomData = Readonly<Partial<Record<CmcdHeaderKey, string>>>;

export function isCmcdHeaderKey(value: string): value is CmcdHeaderKey {
    return CMCD_HEADER_KEYS.some(key => key === value);
}

export function isCmcdKey(value: string): value is CmcdKey {
    for (const key of CMCD_KEY_HEADERS.keys()) {
        if (key === value) {
            return true;
        }
    }
    return false;
}

/**
 * Whether a value is a valid throughput in kbps
 */
export function isPositiveInteger(value: number): boolean {
    return Number.isInteger(value) && value > 0;
}

/**
 * Extract the keys of a custom data value, ex: 'a=1,b,c="x,y"' => ['a', 'b', 'c']
 *
 * Commas inside quoted strings don't separate tokens, `\"` escapes a quote.
 */
export function customDataKeys(value: string): Array<string> {
    const keys: Array<string> = [];
    let token = '';
    let quoted = false;
    for (let i = 0; i < value.length; ++i) {
        const c = value[i];
        if (quoted) {
            if (c === '\\') {
                ++i; // escaped char
            } else if (c === '"') {
                quoted = false;
            }
            continue;
        }
        if (c === '"') {
            quoted = true;
        } else if (c === ',') {
            pushKey(keys, token);
            token = '';
        } else {
            token += c;
        }
    }
    pushKey(keys, token);
    return keys;
}

function pushKey(keys: Array<string>, token: string) {
    const key = token.split('=', 1)[0].trim();
    if (key) {
        keys.push(key);
    }
}

/**
 * Interface CMCD to implement for the CMCD options
 */
export interface ICMCD {
    /**
     * The {@link CMCD} type
     * @defaultValue {@link CMCD.FULL|'full'}
     */
    get cmcd(): CMCD;

    /**
     * Set the {@link CMCD} type,
     * if undefined reset to defaultValue {@link CMCD.FULL|'full'}
     */
    set cmcd(value: CMCD | undefined);

    /**
     * The {@link CMCDMode}
     * @defaultValue {@link CMCDMode.HEADER|'header'}
     */
    get cmcdMode(): CMCDMode;

    /**
     * Set the {@link CMCDMode},
     * if undefined reset to defaultValue {@link CMCDMode.HEADER|'header'}
     */
    set cmcdMode(value: CMCDMode | undefined);
}
