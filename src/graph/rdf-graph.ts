import type { EntityType, Triple, Value } from '../types/index.js';
import { ENTITY_CLASSES, ENTITY_SEGMENTS, RDF_TYPE } from '../profile/healthdcat.js';
import { normalizeBaseIri } from '../utils/iri.js';

/**
 * Mint the identifier of an entity.
 *
 * The catalog sits at the base IRI; every other type is
 * `<base>/<segment>[/<key>]`. Same inputs always give the same identifier.
 */
export function mintIdentifier(baseUri: string, type: EntityType, key?: string | number): string {
    const base = normalizeBaseIri(baseUri);
    if (type === 'Catalog') return base;

    const path = `${base}/${ENTITY_SEGMENTS[type]}`;
    return key === undefined ? path : `${path}/${encodeURIComponent(String(key))}`;
}

export function literalValue(value: string, datatype?: string): Value {
    return datatype ? { kind: 'literal', value, datatype } : { kind: 'literal', value };
}

export function iriValue(id: string): Value {
    return { kind: 'iri', id };
}

function sameValue(a: Value, b: Value): boolean {
    if (a.kind === 'iri' || b.kind === 'iri') {
        return a.kind === 'iri' && b.kind === 'iri' && a.id === b.id;
    }
    return a.value === b.value && a.datatype === b.datatype && a.language === b.language;
}

/**
 * A typed, identified node. The identifier is fixed at construction.
 */
export class Entity {
    private readonly properties = new Map<string, Value[]>();

    constructor(
        readonly id: string,
        readonly type: EntityType,
        private readonly assertWritable: () => void
    ) {}

    /**
     * Add a value under a property IRI. Duplicate values are ignored.
     */
    add(property: string, value: Value): this {
        this.assertWritable();

        const values = this.properties.get(property);
        if (!values) {
            this.properties.set(property, [value]);
        } else if (!values.some((v) => sameValue(v, value))) {
            values.push(value);
        }
        return this;
    }

    get(property: string): readonly Value[] {
        return this.properties.get(property) ?? [];
    }

    /**
     * Triples of this entity: rdf:type first, then properties in insertion order.
     */
    triples(): Triple[] {
        const triples: Triple[] = [
            { subject: this.id, predicate: RDF_TYPE, object: iriValue(ENTITY_CLASSES[this.type]) },
        ];
        for (const [predicate, values] of this.properties) {
            for (const object of values) {
                triples.push({ subject: this.id, predicate, object });
            }
        }
        return triples;
    }
}

/**
 * Ordered collection of entities. Sealed before serialization;
 * any mutation afterwards throws.
 */
export class RdfGraph {
    private readonly entities = new Map<string, Entity>();
    private sealed = false;

    /**
     * Create a new entity. An identifier can only be assigned once.
     */
    addEntity(id: string, type: EntityType): Entity {
        this.assertWritable();
        if (this.entities.has(id)) {
            throw new Error(`Entity '${id}' already exists in the graph`);
        }

        const entity = new Entity(id, type, () => this.assertWritable());
        this.entities.set(id, entity);
        return entity;
    }

    getEntity(id: string): Entity | undefined {
        return this.entities.get(id);
    }

    get size(): number {
        return this.entities.size;
    }

    get isSealed(): boolean {
        return this.sealed;
    }

    seal(): void {
        this.sealed = true;
    }

    entityIds(): string[] {
        return [...this.entities.keys()];
    }

    entitiesOfType(type: EntityType): Entity[] {
        return [...this.entities.values()].filter((e) => e.type === type);
    }

    triples(): Triple[] {
        return [...this.entities.values()].flatMap((e) => e.triples());
    }

    private assertWritable(): void {
        if (this.sealed) {
            throw new Error('Graph is sealed and can no longer be modified');
        }
    }
}
