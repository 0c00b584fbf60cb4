import { PluginGateway, VfsPlugin } from "./types";
import { Route } from "../vfs/types";
import { ValidationError } from "../errors";

/**
 * Runs plugins in registration order over the current set of routes.
 */
export class PluginChain implements PluginGateway {
  private plugins: VfsPlugin[] = [];

  constructor(plugins: VfsPlugin[] = []) {
    for (const plugin of plugins) this.use(plugin);
  }

  use(plugin: VfsPlugin): this {
    if (this.plugins.some((p) => p.name === plugin.name)) {
      throw new ValidationError(`Plugin already registered: ${plugin.name}`, { plugin: plugin.name });
    }
    this.plugins.push(plugin);
    return this;
  }

  list(): string[] {
    return this.plugins.map((p) => p.name);
  }

  handleFileChange(route: Route): Route[] | null {
    let routes: Route[] = [route];

    for (const plugin of this.plugins) {
      const next: Route[] = [];
      for (const current of routes) {
        const result = plugin.handleFileChange(current);
        if (result === undefined) {
          next.push(current);
        } else if (result !== null) {
          next.push(...result);
        }
      }
      routes = next;
      if (routes.length === 0) return null;
    }

    return routes;
  }
}

/**
 * Gateway that reports every raw change as-is.
 */
export const passthroughGateway: PluginGateway = {
  handleFileChange(route) {
    return [route];
  },
};

/**
 * Drops changes whose last segment matches any of the patterns,
 * e.g. editor swap files.
 */
export function ignoreNamesPlugin(patterns: RegExp[]): VfsPlugin {
  return {
    name: "ignore-names",
    handleFileChange(route) {
      const name = route[route.length - 1] ?? "";
      return patterns.some((p) => p.test(name)) ? null : undefined;
    },
  };
}
