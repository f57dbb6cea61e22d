import type { Plugin } from '../types/index.js';
import { PluginRegistry } from '../registry/plugin-registry.js';
import { RdfGeneratorStage } from './rdf-generator.js';
import { BUILTIN_TRANSFORMS } from './transforms.js';
import { ValidatorStage } from './validator.js';

/**
 * Plugins shipped with the converter, in registration order.
 */
export function builtinPlugins(): Plugin[] {
    return [new ValidatorStage(), new RdfGeneratorStage(), ...BUILTIN_TRANSFORMS];
}

/**
 * Bootstrap routine: register the built-in plugins, then any extra ones,
 * each under its own name. Throws DuplicateNameError on a name clash.
 */
export function registerBuiltinPlugins(registry: PluginRegistry, extra: readonly Plugin[] = []): PluginRegistry {
    for (const plugin of [...builtinPlugins(), ...extra]) {
        registry.register(plugin.getName(), plugin);
    }
    return registry;
}

/**
 * Fresh registry holding the built-ins (and extras). Handy for tests and
 * embedders that want isolation from the process-wide registry.
 */
export function createRegistry(extra: readonly Plugin[] = []): PluginRegistry {
    return registerBuiltinPlugins(new PluginRegistry(), extra);
}

export { ValidatorStage, validateRecords, buildRules } from './validator.js';
export { RdfGeneratorStage } from './rdf-generator.js';
export { defineTransform, renameFields, filterRows, trimValues } from './transforms.js';
