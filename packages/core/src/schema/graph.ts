/**
 * Foreign-key graph over the live schema.
 *
 * Nodes are tables, edges are declared FK column pairs. Paths are found by
 * BFS over edges in both directions, so the result does not depend on which
 * side declared the key. Built once per process and read-only afterwards.
 */

import { SchemaIntrospectionError, describeError } from '../errors.js';
import type { ExecutionAdapter, SchemaSnapshot, TableInfo } from '../db/types.js';
import { extractJoinConditions } from './joins.js';

export interface FkEdge {
  fromTable: string;
  fromColumn: string;
  toTable: string;
  toColumn: string;
}

export interface JoinPath {
  tables: string[];
  edges: FkEdge[];
}

export interface JoinValidation {
  valid: boolean;
  diagnostic: string;
}

export const DEFAULT_MAX_HOPS = 3;

const CONDITION_PATTERN = /["`[]?(\w+)["`\]]?\s*\.\s*["`[]?(\w+)["`\]]?\s*=\s*["`[]?(\w+)["`\]]?\s*\.\s*["`[]?(\w+)["`\]]?/;

export function edgeCondition(edge: FkEdge): string {
  return `${edge.fromTable}.${edge.fromColumn} = ${edge.toTable}.${edge.toColumn}`;
}

export function formatJoinPath(path: JoinPath): string {
  return path.tables.join(' → ');
}

export function joinConditions(path: JoinPath): string[] {
  return path.edges.map(edgeCondition);
}

interface Neighbor {
  table: string;
  edge: FkEdge;
}

export class SchemaGraph {
  readonly snapshot: SchemaSnapshot;
  private readonly canonical = new Map<string, string>();
  private readonly tableInfo = new Map<string, TableInfo>();
  private readonly adjacency = new Map<string, Neighbor[]>();
  private readonly edges: FkEdge[] = [];

  private constructor(snapshot: SchemaSnapshot) {
    this.snapshot = snapshot;
    for (const table of snapshot.tables) {
      this.canonical.set(table.name.toLowerCase(), table.name);
      this.tableInfo.set(table.name, table);
      this.adjacency.set(table.name, []);
    }

    for (const fk of snapshot.foreignKeys) {
      const fromTable = this.canonicalTable(fk.fromTable);
      const toTable = this.canonicalTable(fk.toTable);
      if (!fromTable || !toTable) continue;
      const edge: FkEdge = Object.freeze({
        fromTable,
        fromColumn: this.canonicalColumn(fromTable, fk.fromColumn),
        toTable,
        toColumn: this.canonicalColumn(toTable, fk.toColumn),
      });
      this.edges.push(edge);
      this.adjacency.get(fromTable)?.push({ table: toTable, edge });
      if (toTable !== fromTable) {
        this.adjacency.get(toTable)?.push({ table: fromTable, edge });
      }
    }

    for (const neighbors of this.adjacency.values()) {
      neighbors.sort(
        (a, b) =>
          a.table.localeCompare(b.table) ||
          a.edge.fromColumn.localeCompare(b.edge.fromColumn) ||
          a.edge.toColumn.localeCompare(b.edge.toColumn),
      );
    }
  }

  static fromSnapshot(snapshot: SchemaSnapshot): SchemaGraph {
    return new SchemaGraph(snapshot);
  }

  /** Introspect through the adapter. Any failure is fatal for pipeline construction. */
  static async build(adapter: Pick<ExecutionAdapter, 'introspect'>): Promise<SchemaGraph> {
    let snapshot: SchemaSnapshot;
    try {
      snapshot = await adapter.introspect();
    } catch (err: unknown) {
      throw new SchemaIntrospectionError(`Schema introspection failed: ${describeError(err)}`, err);
    }
    if (snapshot.tables.length === 0) {
      throw new SchemaIntrospectionError('Schema introspection found no tables.');
    }
    return new SchemaGraph(snapshot);
  }

  tables(): string[] {
    return this.snapshot.tables.map((t) => t.name);
  }

  table(name: string): TableInfo | undefined {
    const canonical = this.canonicalTable(name);
    return canonical ? this.tableInfo.get(canonical) : undefined;
  }

  get edgeCount(): number {
    return this.edges.length;
  }

  allEdges(): readonly FkEdge[] {
    return this.edges;
  }

  canonicalTable(name: string): string | undefined {
    const bare = name.includes('.') ? name.slice(name.lastIndexOf('.') + 1) : name;
    return this.canonical.get(bare.toLowerCase());
  }

  /** True when an FK joins exactly these two columns, in either direction. */
  hasEdge(tableA: string, columnA: string, tableB: string, columnB: string): boolean {
    const a = this.canonicalTable(tableA);
    const b = this.canonicalTable(tableB);
    if (!a || !b) return false;
    const colA = columnA.toLowerCase();
    const colB = columnB.toLowerCase();
    return (this.adjacency.get(a) ?? []).some(
      ({ edge }) =>
        (edge.fromTable === a &&
          edge.fromColumn.toLowerCase() === colA &&
          edge.toTable === b &&
          edge.toColumn.toLowerCase() === colB) ||
        (edge.fromTable === b &&
          edge.fromColumn.toLowerCase() === colB &&
          edge.toTable === a &&
          edge.toColumn.toLowerCase() === colA),
    );
  }

  /**
   * Fewest-hop FK path between two tables, or null when none exists within `maxHops` edges.
   * The same table on both ends gives a single-node path.
   */
  shortestPath(from: string, to: string, maxHops = DEFAULT_MAX_HOPS): JoinPath | null {
    const start = this.canonicalTable(from);
    const goal = this.canonicalTable(to);
    if (!start || !goal) return null;
    if (start === goal) return { tables: [start], edges: [] };

    const visited = new Set<string>([start]);
    let frontier: JoinPath[] = [{ tables: [start], edges: [] }];

    for (let hop = 0; hop < maxHops && frontier.length > 0; hop++) {
      const next: JoinPath[] = [];
      for (const path of frontier) {
        const tail = path.tables[path.tables.length - 1] ?? start;
        for (const neighbor of this.adjacency.get(tail) ?? []) {
          if (visited.has(neighbor.table)) continue;
          const extended: JoinPath = {
            tables: [...path.tables, neighbor.table],
            edges: [...path.edges, neighbor.edge],
          };
          if (neighbor.table === goal) return extended;
          visited.add(neighbor.table);
          next.push(extended);
        }
      }
      frontier = next;
    }
    return null;
  }

  validateJoinCondition(condition: string, maxHops = DEFAULT_MAX_HOPS): JoinValidation {
    const match = CONDITION_PATTERN.exec(condition);
    if (!match) {
      return { valid: false, diagnostic: `Could not parse join condition: ${condition.trim()}` };
    }
    const [, rawT1 = '', c1 = '', rawT2 = '', c2 = ''] = match;
    const t1 = this.canonicalTable(rawT1);
    const t2 = this.canonicalTable(rawT2);
    const written = `${rawT1}.${c1} = ${rawT2}.${c2}`;

    if (!t1 || !t2) {
      const unknown = [t1 ? null : rawT1, t2 ? null : rawT2].filter((t): t is string => t !== null);
      return { valid: false, diagnostic: `Invalid JOIN: unknown table ${unknown.join(', ')} in ${written}` };
    }

    if (this.hasEdge(t1, c1, t2, c2)) {
      return { valid: true, diagnostic: `Valid FK join: ${written}` };
    }

    if (t1 === t2) {
      return { valid: false, diagnostic: `Invalid JOIN: no foreign key relates ${t1}.${c1} to ${t1}.${c2}` };
    }

    const path = this.shortestPath(t1, t2, maxHops);
    if (!path) {
      return {
        valid: false,
        diagnostic: `Invalid JOIN: ${t1} and ${t2} are not related by any FK path within ${maxHops} hops`,
      };
    }
    if (path.edges.length === 1) {
      return {
        valid: false,
        diagnostic: `Invalid JOIN: ${written} does not match the FK between ${t1} and ${t2}; use ${joinConditions(path).join(' AND ')}`,
      };
    }
    return {
      valid: false,
      diagnostic: `Invalid JOIN: ${written} is not a direct FK relationship. Correct path requires intermediate tables: ${formatJoinPath(path)}`,
    };
  }

  /** Human-readable JOIN conditions connecting two tables. */
  suggestJoinPath(from: string, to: string, maxHops = DEFAULT_MAX_HOPS): string {
    const a = this.canonicalTable(from);
    const b = this.canonicalTable(to);
    if (!a || !b) {
      const unknown = [a ? null : from, b ? null : to].filter((t): t is string => t !== null);
      return `Unknown table: ${unknown.join(', ')}`;
    }
    if (a === b) return `${a} needs no join.`;

    const path = this.shortestPath(a, b, maxHops);
    if (!path) return `No FK relationship found between ${a} and ${b}.`;

    const conditions = joinConditions(path);
    if (conditions.length === 1) return `Direct FK: ${conditions[0]}`;
    return [
      `Multi-hop path required: ${formatJoinPath(path)}`,
      'JOIN conditions needed:',
      ...conditions.map((c) => `  ${c}`),
    ].join('\n');
  }

  /** Join conditions in `sql`, aliases resolved to table names. */
  extractJoinsFromSql(sql: string): string[] {
    return extractJoinConditions(sql).map((c) => c.text);
  }

  private canonicalColumn(table: string, column: string): string {
    const info = this.tableInfo.get(table);
    const found = info?.columns.find((c) => c.name.toLowerCase() === column.toLowerCase());
    return found?.name ?? column;
  }
}
