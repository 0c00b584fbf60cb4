export type { PluginGateway, VfsPlugin } from "./types";
export { PluginChain, passthroughGateway, ignoreNamesPlugin } from "./pluginChain";
