/**
 * Copyright 2025 Ceeblue B.V.
 * This file is part of https://github.com/CeeblueTV/wrts-client which is released under GNU Affero General Public License.
 * See file LICENSE or go to https://spdx.org/licenses/AGPL-3.0-or-later.html for full license details.
 */

// Utils
import { log, LogLevel } from '@ceeblue/web-utils';
log.level = LogLevel.ERROR; // put log to ERROR as default level

// Media
export {
    CMCD,
    CMCDMode,
    MAX_ID_LENGTH,
    RATE_UNSET,
    CMCD_QUERY_PARAM,
    KEY_CMCD_OBJECT,
    KEY_CMCD_REQUEST,
    KEY_CMCD_SESSION,
    KEY_CMCD_STATUS,
    CMCD_HEADER_KEYS,
    KEY_BITRATE,
    KEY_BUFFER_LENGTH,
    KEY_CONTENT_ID,
    KEY_SESSION_ID,
    KEY_MAXIMUM_REQUESTED_BITRATE,
    CMCD_KEY_HEADERS,
    isCmcdHeaderKey,
    isCmcdKey,
    customDataKeys
} from './src/media/CMCD';
export type { ICMCD, CmcdHeaderKey, CmcdKey, CmcdCustomData } from './src/media/CMCD';
export { DEFAULT_MEDIA_ID } from './src/media/MediaItem';
export type { MediaItem } from './src/media/MediaItem';

// CMCD
export { DefaultRequestConfig } from './src/cmcd/RequestConfig';
export type { RequestConfig } from './src/cmcd/RequestConfig';
export { StaticRequestConfig } from './src/cmcd/StaticRequestConfig';
export { CmcdConfiguration, CmcdConfigurationException } from './src/cmcd/CmcdConfiguration';
export type { CmcdConfigurationError, CmcdConfigurationFactory } from './src/cmcd/CmcdConfiguration';
export { CmcdHeadersFactory } from './src/cmcd/CmcdHeadersFactory';
export type { CmcdRequestState } from './src/cmcd/CmcdHeadersFactory';
