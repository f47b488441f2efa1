import { Driver as Neo4jDriver, Integer } from 'neo4j-driver';
import { Binding, Bindings } from 'triple-core';
import type { Slot, Triple } from 'triple-core';
import { compilePatterns } from './compile.js';
import type { BackendOptions, FactStoreBackend } from '../types/index.js';

type Parameters = Record<string, string>;

const SCHEMA_CYPHER =
  'CREATE CONSTRAINT term_value IF NOT EXISTS FOR (t:Term) REQUIRE t.value IS UNIQUE';

function slotExpression(index: number, slot: Slot): string {
  switch (slot) {
    case 'id':
      return `s${index}.value`;
    case 'predicate':
      return `r${index}.predicate`;
    case 'object':
      return `o${index}.value`;
  }
}

function factParameters(fact: Triple): Parameters {
  return { id: fact.id, predicate: fact.predicate, object: fact.object };
}

/**
 * Fact store on Neo4j. A fact is stored as
 * `(:Term {value: id})-[:FACT {predicate}]->(:Term {value: object})`.
 *
 * Each pattern of a conjunction gets its own MATCH clause, so two patterns
 * may match the same relationship. Deleting a fact also deletes the terms it
 * leaves without relationships.
 */
export class Neo4jBackend implements FactStoreBackend {
  constructor(
    private neo4jDriver: Neo4jDriver,
    private readonly options: BackendOptions = {}
  ) {}

  async initialize(): Promise<void> {
    await this.neo4jDriver.verifyConnectivity();
    const session = this.neo4jDriver.session();
    try {
      await session.executeWrite((tx) => tx.run(SCHEMA_CYPHER));
    } finally {
      await session.close();
    }
  }

  async close(): Promise<void> {
    await this.neo4jDriver.close();
  }

  async enumerate(patterns: readonly Triple[]): Promise<Bindings[]> {
    if (patterns.length === 0) return [];

    const { conditions, projections, parameters } = compilePatterns(patterns, {
      column: slotExpression,
      placeholder: (position) => `$p${position}`,
    });
    const params: Parameters = {};
    parameters.forEach((value, i) => {
      params[`p${i}`] = value;
    });

    const clauses = patterns.map(
      (_, i) => `MATCH (s${i}:Term)-[r${i}:FACT]->(o${i}:Term)`
    );
    if (conditions.length > 0) {
      clauses.push(`WHERE ${conditions.join(' AND ')}`);
    }

    const session = this.neo4jDriver.session();
    try {
      if (projections.length === 0) {
        const cypher = [...clauses, 'RETURN count(*) AS matched'].join('\n');
        this.logQuery(cypher);
        const res = await session.executeRead((tx) =>
          tx.run<{ matched: Integer }>(cypher, params)
        );
        const matched = res.records[0]?.get('matched').toNumber() ?? 0;
        return matched > 0 ? [Bindings.EMPTY] : [];
      }

      const select = projections.map((p) => `${p.expression} AS ${p.alias}`).join(', ');
      const cypher = [...clauses, `RETURN DISTINCT ${select}`].join('\n');
      this.logQuery(cypher);
      const res = await session.executeRead((tx) =>
        tx.run<Record<string, string>>(cypher, params)
      );
      return res.records.map(
        (record) =>
          new Bindings(projections.map((p) => new Binding(p.variable, record.get(p.alias))))
      );
    } catch (error) {
      console.error('Error querying the triple store:', error);
      throw error;
    } finally {
      await session.close();
    }
  }

  async insert(fact: Triple): Promise<boolean> {
    const changed = await this.write(
      `MERGE (s:Term {value: $id})
       MERGE (o:Term {value: $object})
       MERGE (s)-[r:FACT {predicate: $predicate}]->(o)
       RETURN count(r) AS changed`,
      factParameters(fact)
    );
    return changed !== null;
  }

  async delete(fact: Triple): Promise<boolean> {
    const changed = await this.write(
      `MATCH (s:Term {value: $id})-[r:FACT {predicate: $predicate}]->(o:Term {value: $object})
       DELETE r
       WITH collect(DISTINCT s) + collect(DISTINCT o) AS terms, count(*) AS changed
       FOREACH (term IN [t IN terms WHERE NOT (t)--()] | DELETE term)
       RETURN changed`,
      factParameters(fact)
    );
    return changed !== null && changed > 0;
  }

  async clear(): Promise<boolean> {
    const changed = await this.write(
      `MATCH (t:Term)
       DETACH DELETE t
       RETURN count(*) AS changed`,
      {}
    );
    return changed !== null;
  }

  /** Count reported by the statement, or null when it failed. */
  private async write(cypher: string, params: Parameters): Promise<number | null> {
    this.logQuery(cypher);
    const session = this.neo4jDriver.session();
    try {
      const res = await session.executeWrite((tx) =>
        tx.run<{ changed: Integer }>(cypher, params)
      );
      return res.records[0]?.get('changed').toNumber() ?? 0;
    } catch (error) {
      console.error(`Failed when executing transaction ${cypher}:`, error);
      return null;
    } finally {
      await session.close();
    }
  }

  private logQuery(cypher: string): void {
    if (this.options.logQueries) {
      console.error(`Executing Cypher query: ${cypher}`);
    }
  }
}
