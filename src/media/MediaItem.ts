/**
 * Copyright 2025 Ceeblue B.V.
 * This file is part of https://github.com/CeeblueTV/wrts-client which is released under GNU Affero General Public License.
 * See file LICENSE or go to https://spdx.org/licenses/AGPL-3.0-or-later.html for full license details.
 */

/**
 * Media id used when a {@link MediaItem} doesn't declare one
 */
export const DEFAULT_MEDIA_ID = '';

/**
 * Minimal media identity descriptor from which a CMCD configuration can be created
 */
export type MediaItem = {
    /**
     * Identifier of the media, used as CMCD content id when not empty
     */
    mediaId?: string;
};
