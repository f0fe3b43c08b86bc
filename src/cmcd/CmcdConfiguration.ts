/**
 * Copyright 2025 Ceeblue B.V.
 * This file is part of https://github.com/CeeblueTV/wrts-client which is released under GNU Affero General Public License.
 * See file LICENSE or go to https://spdx.org/licenses/AGPL-3.0-or-later.html for full license details.
 */

import { randomUUID } from 'node:crypto';
import {
    MAX_ID_LENGTH,
    KEY_BITRATE,
    KEY_BUFFER_LENGTH,
    KEY_CONTENT_ID,
    KEY_SESSION_ID,
    KEY_MAXIMUM_REQUESTED_BITRATE
} from '../media/CMCD';
import { DEFAULT_MEDIA_ID, MediaItem } from '../media/MediaItem';
import { DefaultRequestConfig, RequestConfig } from './RequestConfig';

export type CmcdConfigurationError =
    /**
     * Represents an invalid argument, as an ID longer than {@link MAX_ID_LENGTH}
     */
    | { type: 'CmcdConfigurationError'; name: 'Invalid argument'; detail: string }
    /**
     * Represents a configuration created without {@link RequestConfig}
     */
    | { type: 'CmcdConfigurationError'; name: 'Missing policy' };

/**
 * Exception thrown on a {@link CmcdConfigurationError}, always while constructing
 */
export class CmcdConfigurationException extends Error {
    readonly error: CmcdConfigurationError;

    constructor(error: CmcdConfigurationError) {
        super(error.name === 'Invalid argument' ? error.name + ', ' + error.detail : error.name);
        this.name = 'CmcdConfigurationException';
        this.error = error;
    }
}

/**
 * Factory for {@link CmcdConfiguration} instances.
 *
 * Implementations must not make assumptions about which request or session calls their methods.
 */
export interface CmcdConfigurationFactory {
    /**
     * Creates a {@link CmcdConfiguration} based on the provided {@link MediaItem}
     */
    createCmcdConfiguration(mediaItem: MediaItem): CmcdConfiguration;
}

function checkId(name: string, id?: string) {
    if (id != null && id.length > MAX_ID_LENGTH) {
        throw new CmcdConfigurationException({
            type: 'CmcdConfigurationError',
            name: 'Invalid argument',
            detail: `${name} exceeds ${MAX_ID_LENGTH} characters (${id.length})`
        });
    }
}

/**
 * Represents a configuration for the Common Media Client Data (CMCD) logging,
 * created once per playback session and read-only afterwards.
 *
 * @example
 * // Disable bitrate logging for the whole session
 * const config = new CmcdConfiguration(sessionId, contentId, new (class extends DefaultRequestConfig {
 *    isKeyAllowed(key: string) {
 *       return key !== KEY_BITRATE;
 *    }
 * })());
 * config.isBitrateLoggingAllowed(); // false
 */
export class CmcdConfiguration {
    /**
     * The default factory implementation.
     *
     * It creates a {@link CmcdConfiguration} by generating a random session ID and using the content ID
     * from {@link MediaItem.mediaId} (or {@link DEFAULT_MEDIA_ID} if the media item doesn't define one),
     * bound to a {@link DefaultRequestConfig}.
     */
    static readonly DEFAULT_FACTORY: CmcdConfigurationFactory = {
        createCmcdConfiguration(mediaItem: MediaItem): CmcdConfiguration {
            return new CmcdConfiguration(randomUUID(), mediaItem.mediaId || DEFAULT_MEDIA_ID, new DefaultRequestConfig());
        }
    };

    /**
     * A GUID identifying the current playback session, or undefined if unset.
     *
     * A playback session typically ties together segments belonging to a single media asset.
     */
    get sessionId(): string | undefined {
        return this._sessionId;
    }

    /**
     * A GUID identifying the current content, or undefined if unset.
     *
     * Consistent across sessions and devices, defined and updated at the discretion of the service provider.
     */
    get contentId(): string | undefined {
        return this._contentId;
    }

    /**
     * Dynamic request specific configuration
     */
    get requestConfig(): RequestConfig {
        return this._requestConfig;
    }

    private readonly _sessionId?: string;
    private readonly _contentId?: string;
    private readonly _requestConfig: RequestConfig;

    /**
     * Creates a CMCD configuration
     *
     * @param sessionId session ID of at most {@link MAX_ID_LENGTH} characters
     * @param contentId content ID of at most {@link MAX_ID_LENGTH} characters
     * @param requestConfig request configuration, shared and never modified
     * @throws {@link CmcdConfigurationException} on invalid ID or missing request configuration
     */
    constructor(sessionId: string | undefined, contentId: string | undefined, requestConfig: RequestConfig) {
        checkId('sessionId', sessionId);
        checkId('contentId', contentId);
        // can be called from plain JS
        if (!requestConfig) {
            throw new CmcdConfigurationException({ type: 'CmcdConfigurationError', name: 'Missing policy' });
        }
        this._sessionId = sessionId;
        this._contentId = contentId;
        this._requestConfig = requestConfig;
    }

    /**
     * Whether logging bitrate is allowed by the {@link RequestConfig}
     */
    isBitrateLoggingAllowed(): boolean {
        return this._requestConfig.isKeyAllowed(KEY_BITRATE);
    }

    /**
     * Whether logging buffer length is allowed by the {@link RequestConfig}
     */
    isBufferLengthLoggingAllowed(): boolean {
        return this._requestConfig.isKeyAllowed(KEY_BUFFER_LENGTH);
    }

    /**
     * Whether logging content ID is allowed by the {@link RequestConfig}
     */
    isContentIdLoggingAllowed(): boolean {
        return this._requestConfig.isKeyAllowed(KEY_CONTENT_ID);
    }

    /**
     * Whether logging session ID is allowed by the {@link RequestConfig}
     */
    isSessionIdLoggingAllowed(): boolean {
        return this._requestConfig.isKeyAllowed(KEY_SESSION_ID);
    }

    /**
     * Whether logging maximum requested throughput is allowed by the {@link RequestConfig}
     */
    isMaximumRequestThroughputLoggingAllowed(): boolean {
        return this._requestConfig.isKeyAllowed(KEY_MAXIMUM_REQUESTED_BITRATE);
    }
}
