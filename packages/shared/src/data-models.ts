/**
 * @file data-models.ts
 * @description Parameter models for the tab-management commands sent to the browser extension.
 * @module TabBridge/Shared
 */

/**
 * Selects the tab an operation applies to.
 * - `0`: the active tab (for `NewTab`, the last position in the tab strip).
 * - `1`: the tab at the accompanying index.
 */
export type TabTarget = 0 | 1;

export const TAB_TARGET_DEFAULT: TabTarget = 0;

/**
 * Parameters of the `NewTab` command.
 * @property {string} url - The URL to open, after template expansion.
 * @property {TabTarget} target - `0` appends the tab, `1` inserts it at `index`.
 */
export interface NewTabParameters {
    url: string;
    active: boolean;
    pinned: boolean;
    target: TabTarget;
    index: number;
}

/**
 * Parameters of the `NewUrl` command, produced by the UpdateTab action.
 */
export interface UpdateTabParameters {
    url: string;
    active: boolean;
    pinned: boolean;
    muted: boolean;
    target: TabTarget;
    index: number;
}

export interface ReloadTabParameters {
    target: TabTarget;
    index: number;
    bypasscache: boolean;
}

/**
 * Parameters of the `MoveTab` command.
 * @property {number} startindex - Index of the tab to move when `target` is `1`.
 * @property {number} endindex - Destination index.
 */
export interface MoveTabParameters {
    target: TabTarget;
    startindex: number;
    endindex: number;
}

export interface RemoveTabParameters {
    target: TabTarget;
    index: number;
}
