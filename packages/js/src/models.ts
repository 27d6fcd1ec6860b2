/**
 * Model definitions.
 *
 * A model maps the headers of an import file onto the attributes of a
 * resource. Definitions are validated once, when they are defined, so
 * that header paths, predicates and codecs are known to be usable
 * before any row is read.
 */

import { ModelDefinitionError } from './errors.js';
import { COLUMN_INDEX, COLUMN_URI } from './namespaces.js';
import { ModelDefinitionSchema, formatIssues } from './schemas.js';
import { createCodec } from './terms.js';
import {
    AttributePath,
    EmbeddedDefinition,
    ModelDefinitionInput,
    ModelDescriptor,
    PropertyDefinition,
    PropertyDefinitionInput,
} from './types.js';

/**
 * Parse a dotted attribute path. Only direct (`title`) and two-level
 * embedded (`part.label`) paths are supported.
 */
export function parseAttributePath(path: string): AttributePath {
    const segments = path.split('.');
    if (segments.some((segment) => segment.length === 0)) {
        throw new ModelDefinitionError(`Attribute path "${path}" has an empty segment`);
    }
    if (segments.length > 2) {
        throw new ModelDefinitionError(
            `Attribute path "${path}" nests deeper than two levels, which is not supported`
        );
    }
    const [outer, inner] = segments;
    return inner === undefined ? { outer } : { outer, inner };
}

export function formatAttributePath(path: AttributePath): string {
    return path.inner === undefined ? path.outer : `${path.outer}.${path.inner}`;
}

function resolveProperties(
    inputs: Record<string, PropertyDefinitionInput>
): Map<string, PropertyDefinition> {
    const properties = new Map<string, PropertyDefinition>();
    for (const [name, input] of Object.entries(inputs)) {
        properties.set(name, { name, predicate: input.predicate, codec: createCodec(input) });
    }
    return properties;
}

/**
 * Validate a model definition and resolve it into a descriptor.
 *
 * @example
 * ```ts
 * const Letter = defineModel({
 *   name: 'letter.Letter',
 *   properties: { title: { predicate: 'http://purl.org/dc/terms/title' } },
 *   headerMap: { Title: 'title' },
 * });
 * ```
 */
export function defineModel(input: ModelDefinitionInput): ModelDescriptor {
    const parsed = ModelDefinitionSchema.safeParse(input);
    if (!parsed.success) {
        throw new ModelDefinitionError(
            `Invalid model "${input.name}": ${formatIssues(parsed.error)}`,
            { cause: parsed.error }
        );
    }
    const definition = parsed.data;

    const properties = resolveProperties(definition.properties ?? {});
    const embedded = new Map<string, EmbeddedDefinition>();
    for (const [name, input] of Object.entries(definition.embedded ?? {})) {
        if (properties.has(name)) {
            throw new ModelDefinitionError(
                `Model "${definition.name}" defines "${name}" as both a property and an embedded object`
            );
        }
        embedded.set(name, {
            name,
            predicate: input.predicate,
            properties: resolveProperties(input.properties),
        });
    }

    const headerMap = new Map<string, AttributePath>();
    for (const [header, rawPath] of Object.entries(definition.headerMap)) {
        if (header === COLUMN_URI || header === COLUMN_INDEX) {
            throw new ModelDefinitionError(`Header "${header}" is reserved`);
        }
        const path = parseAttributePath(rawPath);
        if (path.inner === undefined) {
            if (!properties.has(path.outer)) {
                throw new ModelDefinitionError(
                    `Header "${header}" maps to unknown property "${path.outer}"`
                );
            }
        } else if (!embedded.get(path.outer)?.properties.has(path.inner)) {
            throw new ModelDefinitionError(
                `Header "${header}" maps to unknown embedded property "${rawPath}"`
            );
        }
        headerMap.set(header, path);
    }

    return {
        name: definition.name,
        types: definition.types ?? [],
        properties,
        embedded,
        headerMap,
    };
}

/** Property definition a header path resolves to; the path is known to be valid. */
export function propertyForPath(model: ModelDescriptor, path: AttributePath): PropertyDefinition {
    const definition = path.inner === undefined
        ? model.properties.get(path.outer)
        : model.embedded.get(path.outer)?.properties.get(path.inner);
    if (!definition) {
        throw new ModelDefinitionError(
            `Model "${model.name}" has no attribute "${formatAttributePath(path)}"`
        );
    }
    return definition;
}
