/**
 * Geo Object Query Collaborator
 *
 * Composable, parameterised query over the geo objects of a map. Predicates
 * are a closed union so that every storage backend can translate them; the
 * values they compare against are bound separately by name, the way a SQL
 * query builder binds placeholders.
 *
 * The in-memory implementation evaluates the same predicates over a plain
 * array and backs the tests and local runs.
 */

import { isGeoObjectActive, type GeoObject } from '../models/geo-object.js';

/**
 * Values a query parameter may be bound to
 */
export type QueryParameterValue = number | string | boolean | Date | readonly number[];

export type QueryPredicate =
  /** object.mapId = :param */
  | { kind: 'mapEquals'; param: string }
  /** object is live at :param (a Date) */
  | { kind: 'activeAt'; param: string }
  /** object.id IN (:param) */
  | { kind: 'idIn'; param: string }
  /** object.side.id IN (:param); requires the side relation */
  | { kind: 'sideIdIn'; param: string }
  /** 1 = 0 */
  | { kind: 'never' };

export interface GeoObjectQuery {
  /** Replaces all predicates with this one */
  where(predicate: QueryPredicate): GeoObjectQuery;
  /** Adds a conjunct */
  andWhere(predicate: QueryPredicate): GeoObjectQuery;
  setParameter(name: string, value: QueryParameterValue): GeoObjectQuery;
  execute(): Promise<GeoObject[]>;
}

export interface GeoObjectRepository {
  createQuery(): GeoObjectQuery;
  /** Default observer view: every live object on the map */
  findActiveByMap(mapId: number, now?: Date): Promise<GeoObject[]>;
}

/**
 * Error raised when a predicate references an unbound or mistyped parameter
 */
export class QueryParameterError extends Error {
  constructor(
    message: string,
    public readonly parameter: string
  ) {
    super(message);
    this.name = 'QueryParameterError';
  }
}

/**
 * Builds the base "live objects on this map" query every observer view starts from
 */
export function createActiveObjectsQuery(
  repository: GeoObjectRepository,
  mapId: number,
  now: Date
): GeoObjectQuery {
  return repository
    .createQuery()
    .where({ kind: 'mapEquals', param: 'map' })
    .andWhere({ kind: 'activeAt', param: 'now' })
    .setParameter('map', mapId)
    .setParameter('now', now);
}

/**
 * In-memory query over a snapshot of objects
 */
export class InMemoryGeoObjectQuery implements GeoObjectQuery {
  private predicates: QueryPredicate[] = [];
  private parameters: Map<string, QueryParameterValue> = new Map();

  constructor(private readonly source: () => readonly GeoObject[]) {}

  where(predicate: QueryPredicate): GeoObjectQuery {
    this.predicates = [predicate];
    return this;
  }

  andWhere(predicate: QueryPredicate): GeoObjectQuery {
    this.predicates.push(predicate);
    return this;
  }

  setParameter(name: string, value: QueryParameterValue): GeoObjectQuery {
    this.parameters.set(name, value);
    return this;
  }

  /** Predicates in the order they were added (for testing) */
  getPredicates(): QueryPredicate[] {
    return [...this.predicates];
  }

  /** Bound parameters (for testing) */
  getParameters(): Map<string, QueryParameterValue> {
    return new Map(this.parameters);
  }

  async execute(): Promise<GeoObject[]> {
    const tests = this.predicates.map((predicate) => this.compile(predicate));
    return this.source().filter((object) => tests.every((test) => test(object)));
  }

  private compile(predicate: QueryPredicate): (object: GeoObject) => boolean {
    switch (predicate.kind) {
      case 'never':
        return () => false;
      case 'mapEquals': {
        const mapId = this.numberParameter(predicate.param);
        return (object) => object.mapId === mapId;
      }
      case 'activeAt': {
        const now = this.dateParameter(predicate.param);
        return (object) => isGeoObjectActive(object, now);
      }
      case 'idIn': {
        const ids = new Set(this.listParameter(predicate.param));
        return (object) => ids.has(object.id);
      }
      case 'sideIdIn': {
        const ids = new Set(this.listParameter(predicate.param));
        return (object) => object.sideId !== null && ids.has(object.sideId);
      }
    }
  }

  private requireParameter(name: string): QueryParameterValue {
    const value = this.parameters.get(name);
    if (value === undefined) {
      throw new QueryParameterError(`Query parameter "${name}" is not bound`, name);
    }
    return value;
  }

  private numberParameter(name: string): number {
    const value = this.requireParameter(name);
    if (typeof value !== 'number') {
      throw new QueryParameterError(`Query parameter "${name}" must be a number`, name);
    }
    return value;
  }

  private dateParameter(name: string): Date {
    const value = this.requireParameter(name);
    if (!(value instanceof Date)) {
      throw new QueryParameterError(`Query parameter "${name}" must be a Date`, name);
    }
    return value;
  }

  private listParameter(name: string): readonly number[] {
    const value = this.requireParameter(name);
    if (!Array.isArray(value)) {
      throw new QueryParameterError(`Query parameter "${name}" must be a list of ids`, name);
    }
    return value;
  }
}

/**
 * In-memory geo object store for development/testing
 */
export class InMemoryGeoObjectRepository implements GeoObjectRepository {
  private objects: GeoObject[] = [];
  private queryCount = 0;

  constructor(objects: readonly GeoObject[] = []) {
    this.objects = [...objects];
  }

  add(...objects: GeoObject[]): void {
    this.objects.push(...objects);
  }

  createQuery(): InMemoryGeoObjectQuery {
    this.queryCount++;
    return new InMemoryGeoObjectQuery(() => this.objects);
  }

  async findActiveByMap(mapId: number, now: Date = new Date()): Promise<GeoObject[]> {
    return createActiveObjectsQuery(this, mapId, now).execute();
  }

  /** Number of queries created so far (for testing) */
  getQueryCount(): number {
    return this.queryCount;
  }

  clear(): void {
    this.objects = [];
    this.queryCount = 0;
  }
}
