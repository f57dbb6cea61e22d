import type { Plugin, PluginKind, PluginOfKind } from '../types/index.js';
import { DuplicateNameError, UnknownPluginError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Name → plugin mapping.
 *
 * Append-only: registering a taken name throws DuplicateNameError and the
 * first registration stays in effect. There is no removal. Populate it at
 * startup, then treat it as read-only while conversions run.
 */
export class PluginRegistry {
    private readonly plugins = new Map<string, Plugin>();

    register(name: string, plugin: Plugin): void {
        if (this.plugins.has(name)) {
            throw new DuplicateNameError(name);
        }

        this.plugins.set(name, plugin);
        getLogger().debug({ name, kind: plugin.kind }, 'Plugin registered');
    }

    get(name: string): Plugin {
        const plugin = this.plugins.get(name);
        if (!plugin) {
            throw new UnknownPluginError(name);
        }
        return plugin;
    }

    /**
     * Look up a plugin and check it implements the expected stage kind.
     */
    resolve<K extends PluginKind>(name: string, kind: K): PluginOfKind<K> {
        const plugin = this.get(name);
        if (!isKind(plugin, kind)) {
            throw new UnknownPluginError(name, `Plugin '${name}' is a ${plugin.kind}, not a ${kind}`);
        }
        return plugin;
    }

    has(name: string): boolean {
        return this.plugins.has(name);
    }

    /**
     * Registered names in registration order. For discovery and diagnostics
     * only; execution order always comes from the conversion options.
     */
    list(): string[] {
        return [...this.plugins.keys()];
    }
}

function isKind<K extends PluginKind>(plugin: Plugin, kind: K): plugin is PluginOfKind<K> {
    return plugin.kind === kind;
}

/**
 * Process-wide registry singleton, created on first use.
 */
let registryInstance: PluginRegistry | null = null;

export function getRegistry(): PluginRegistry {
    if (!registryInstance) {
        registryInstance = new PluginRegistry();
    }
    return registryInstance;
}
