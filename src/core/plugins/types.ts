/**
 * Plugin gateway contract consumed by the VFS.
 */

import { Route } from "../vfs/types";

/**
 * Expands one raw changed route into the logical routes that changed.
 * Called synchronously for every recorded change and expected to be
 * deterministic. `null` or an empty list suppresses the change.
 */
export interface PluginGateway {
  handleFileChange(route: Route): Route[] | null;
}

/**
 * One step of a plugin chain.
 * Return `undefined` to pass the route through untouched, `null` or `[]` to
 * drop it, or the routes that replace it.
 */
export interface VfsPlugin {
  name: string;
  handleFileChange(route: Route): Route[] | null | undefined;
}
