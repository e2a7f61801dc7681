import { QueryResult, QueryResultRow } from 'pg';
import { database, Queryable } from '../connection';
import { DatabaseError, mapDatabaseError } from '../../utils/errors';

export interface PaginationOptions {
  page: number;
  limit: number;
}

export interface PaginatedResult<T> {
  data: T[];
  pagination: {
    page: number;
    limit: number;
    total: number;
    totalPages: number;
    hasNext: boolean;
    hasPrev: boolean;
  };
}

/**
 * Narrows a text column to one of the values the domain allows.
 */
export function parseEnum<T extends string>(allowed: readonly T[], value: string, column: string): T {
  const match = allowed.find(candidate => candidate === value);
  if (match === undefined) {
    throw new DatabaseError(`Unexpected value in ${column}`, { value });
  }
  return match;
}

/**
 * Common plumbing for the SQL repositories. Every method takes an optional
 * client so that it can join a transaction opened by the caller.
 */
export abstract class BaseRepository {
  private readonly db: Queryable;

  constructor(db: Queryable = database) {
    this.db = db;
  }

  /**
   * Run a statement on the given client, or on the pool when none is given.
   * Driver errors come back as AppErrors.
   */
  protected async executeQuery<R extends QueryResultRow = QueryResultRow>(
    query: string,
    params: unknown[] = [],
    client?: Queryable
  ): Promise<QueryResult<R>> {
    try {
      return await (client ?? this.db).query<R>(query, params);
    } catch (error) {
      throw mapDatabaseError(error);
    }
  }

  protected buildPaginationClause(pagination?: Partial<PaginationOptions>): {
    limitClause: string;
    offset: number;
    limit: number;
    page: number;
  } {
    const limit = pagination?.limit || 20;
    const page = pagination?.page || 1;
    const offset = (page - 1) * limit;

    return {
      limitClause: `LIMIT ${limit} OFFSET ${offset}`,
      offset,
      limit,
      page
    };
  }

  protected calculatePaginationMeta<T>(
    total: number,
    page: number,
    limit: number
  ): PaginatedResult<T>['pagination'] {
    const totalPages = Math.ceil(total / limit);

    return {
      page,
      limit,
      total,
      totalPages,
      hasNext: page < totalPages,
      hasPrev: page > 1
    };
  }
}
