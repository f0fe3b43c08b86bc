/**
 * Copyright 2025 Ceeblue B.V.
 * This file is part of https://github.com/CeeblueTV/wrts-client which is released under GNU Affero General Public License.
 * See file LICENSE or go to https://spdx.org/licenses/AGPL-3.0-or-later.html for full license details.
 */

import { CmcdCustomData, CmcdHeaderKey, RATE_UNSET, customDataKeys, isCmcdHeaderKey, isCmcdKey, isPositiveInteger } from '../media/CMCD';
import { CmcdConfigurationException } from './CmcdConfiguration';
import { DefaultRequestConfig } from './RequestConfig';

function invalidArgument(detail: string): CmcdConfigurationException {
    return new CmcdConfigurationException({ type: 'CmcdConfigurationError', name: 'Invalid argument', detail });
}

/**
 * StaticRequestConfig is a {@link RequestConfig} built from fixed parameters for the whole session.
 *
 * Parameters are checked on construction, so a misconfiguration fails before being bound to a
 * {@link CmcdConfiguration}: custom data must be indexed by a CMCD header key and must not declare
 * a well-known key which stays allowed.
 *
 * @example
 * const requestConfig = new StaticRequestConfig({
 *    disallowedKeys: [KEY_CONTENT_ID],
 *    customData: { [KEY_CMCD_SESSION]: 'com.example-player="1.2"' },
 *    maximumThroughputKbps: throughputKbps => throughputKbps * 2
 * });
 */
export class StaticRequestConfig extends DefaultRequestConfig {
    private _disallowedKeys: Set<string>;
    private _customData: CmcdCustomData;
    private _maximumThroughputKbps?: number | ((throughputKbps: number) => number);

    /**
     * @param params.disallowedKeys keys never logged, all others are allowed
     * @param params.customData custom data by header key
     * @param params.maximumThroughputKbps fixed maximum requested throughput, or function computing it from the observed throughput
     * @throws {@link CmcdConfigurationException} on invalid parameters
     */
    constructor(
        params: {
            disallowedKeys?: Iterable<string>;
            customData?: CmcdCustomData;
            maximumThroughputKbps?: number | ((throughputKbps: number) => number);
        } = {}
    ) {
        super();
        this._disallowedKeys = new Set(params.disallowedKeys);
        const customData: Partial<Record<CmcdHeaderKey, string>> = {};
        for (const [header, value] of Object.entries<string | undefined>(params.customData ?? {})) {
            if (!isCmcdHeaderKey(header)) {
                throw invalidArgument(`custom data header ${header} is not a CMCD header`);
            }
            if (value == null) {
                continue;
            }
            for (const key of customDataKeys(value)) {
                if (isCmcdKey(key) && this.isKeyAllowed(key)) {
                    throw invalidArgument(`custom data key ${key} of ${header} is an allowed CMCD key`);
                }
            }
            customData[header] = value;
        }
        this._customData = Object.freeze(customData);
        const maximumThroughputKbps = params.maximumThroughputKbps;
        if (typeof maximumThroughputKbps === 'number' && !isPositiveInteger(maximumThroughputKbps)) {
            throw invalidArgument(`maximum throughput ${maximumThroughputKbps} is not a positive integer`);
        }
        this._maximumThroughputKbps = maximumThroughputKbps;
    }

    isKeyAllowed(key: string): boolean {
        return !this._disallowedKeys.has(key);
    }

    customData(): CmcdCustomData {
        return this._customData;
    }

    requestedMaximumThroughputKbps(throughputKbps: number): number {
        if (this._maximumThroughputKbps == null) {
            return RATE_UNSET;
        }
        if (typeof this._maximumThroughputKbps === 'number') {
            return this._maximumThroughputKbps;
        }
        if (throughputKbps === RATE_UNSET) {
            // nothing observed to compute from
            return RATE_UNSET;
        }
        const maximumThroughputKbps = this._maximumThroughputKbps(throughputKbps);
        return isPositiveInteger(maximumThroughputKbps) ? maximumThroughputKbps : RATE_UNSET;
    }
}
