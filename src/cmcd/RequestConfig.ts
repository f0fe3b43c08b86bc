/**
 * Copyright 2025 Ceeblue B.V.
 * This file is part of https://github.com/CeeblueTV/wrts-client which is released under GNU Affero General Public License.
 * See file LICENSE or go to https://spdx.org/licenses/AGPL-3.0-or-later.html for full license details.
 */

import { CmcdCustomData, RATE_UNSET } from '../media/CMCD';

const NO_CUSTOM_DATA: CmcdCustomData = Object.freeze({});

/**
 * Represents configuration which can vary on each request.
 *
 * Implementations must not make assumptions about which request calls their methods, nor in which order:
 * a same instance is shared by every in-flight request of a playback session (audio, video, subtitles...).
 * An implementation holding mutable state is alone responsible for keeping it consistent.
 *
 * Extend {@link DefaultRequestConfig} to override only some of these decisions.
 */
export interface RequestConfig {
    /**
     * Checks whether the specified key is allowed in CMCD logging.
     * Keys without specific rule must be allowed.
     *
     * @param key A {@link CmcdKey} or any other CMCD key
     */
    isKeyAllowed(key: string): boolean;

    /**
     * Retrieves the custom data associated with CMCD logging.
     *
     * If a value contains one of the {@link CmcdKey} keys then this key must not be
     * {@link isKeyAllowed | allowed}, otherwise it could be included twice in the produced log.
     */
    customData(): CmcdCustomData;

    /**
     * Returns the maximum throughput requested in kbps, or {@link RATE_UNSET} if unknown,
     * in which case the maximum throughput is not logged upstream.
     *
     * @param throughputKbps throughput in kbps observed for the audio or video object being requested
     */
    requestedMaximumThroughputKbps(throughputKbps: number): number;
}

/**
 * Default {@link RequestConfig} which enables all the keys, provides empty custom data
 * and sets the maximum requested throughput to {@link RATE_UNSET}
 */
export class DefaultRequestConfig implements RequestConfig {
    isKeyAllowed(key: string): boolean {
        return true;
    }

    customData(): CmcdCustomData {
        return NO_CUSTOM_DATA;
    }

    requestedMaximumThroughputKbps(throughputKbps: number): number {
        return RATE_UNSET;
    }
}
