/**
 * Model registry.
 *
 * Models are registered by name at startup and looked up when an import
 * names one; there is no loading of model code at run time.
 */

import { Letter } from './catalog/letter.js';
import { Issue } from './catalog/newspaper.js';
import { ModelDefinitionError, UnknownModelError } from './errors.js';
import { ModelDescriptor } from './types.js';

export const BUILT_IN_MODELS: readonly ModelDescriptor[] = [Letter, Issue];

export class ModelRegistry {
    private readonly models = new Map<string, ModelDescriptor>();

    constructor(models: Iterable<ModelDescriptor> = []) {
        for (const model of models) {
            this.register(model);
        }
    }

    register(model: ModelDescriptor): this {
        if (this.models.has(model.name)) {
            throw new ModelDefinitionError(`Model "${model.name}" is already registered`);
        }
        this.models.set(model.name, model);
        return this;
    }

    has(name: string): boolean {
        return this.models.has(name);
    }

    get(name: string): ModelDescriptor {
        const model = this.models.get(name);
        if (!model) {
            throw new UnknownModelError(name);
        }
        return model;
    }

    names(): string[] {
        return [...this.models.keys()].sort();
    }
}

/** A registry holding the built-in models. */
export function createDefaultRegistry(): ModelRegistry {
    return new ModelRegistry(BUILT_IN_MODELS);
}
