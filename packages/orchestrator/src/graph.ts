import Debug from "debug";
import { ValidationError } from "./errors";
import {
  CertificateAuthority,
  ChannelEntity,
  DependencyGraph,
  Entity,
  Msp,
  Topology,
} from "./types";

const debug = Debug("fabkube::graph");

/**
 * Expand the topology into the entities the orchestrator reconciles, in
 * declaration order: cas, msps, orderer nodes, peer nodes, channels.
 */
export function topologyEntities(topology: Topology): Entity[] {
  const cas = new Map<string, CertificateAuthority>(
    topology.cas.map((ca) => [ca.name, ca]),
  );
  const msps = new Map<string, Msp>(topology.msps.map((msp) => [msp.name, msp]));

  const caOf = (name: string): CertificateAuthority => {
    const ca = cas.get(name);
    if (!ca) throw new ValidationError([`unknown ca "${name}"`]);
    return ca;
  };
  const mspOf = (name: string): Msp => {
    const msp = msps.get(name);
    if (!msp) throw new ValidationError([`unknown msp "${name}"`]);
    return msp;
  };

  const entities: Entity[] = [];

  for (const ca of topology.cas) {
    entities.push({
      kind: "ca",
      name: ca.name,
      ca,
      parent: ca.parentCa ? caOf(ca.parentCa) : undefined,
    });
  }

  for (const msp of topology.msps) {
    entities.push({ kind: "msp", name: msp.name, msp, ca: caOf(msp.ca) });
  }

  for (const group of topology.ordererGroups) {
    const msp = mspOf(group.msp);
    for (const name of group.names) {
      entities.push({
        kind: "orderer",
        name,
        group,
        msp,
        ca: caOf(msp.ca),
        genesisMsps: topology.msps,
      });
    }
  }

  const channels: ChannelEntity[] = [];
  for (const group of topology.peerGroups) {
    const msp = mspOf(group.msp);
    for (const name of group.names) {
      entities.push({ kind: "peer", name, group, msp, ca: caOf(msp.ca) });
    }

    if (!group.channelName) continue;
    const orderer = group.orderer || topology.ordererGroups[0]?.names[0];
    const ordererGroup =
      orderer &&
      topology.ordererGroups.find((g) => g.names.includes(orderer));
    if (!orderer || !ordererGroup)
      throw new ValidationError([
        `channel "${group.channelName}" has no orderer to be created through`,
      ]);

    channels.push({
      kind: "channel",
      name: group.channelName,
      group,
      msp,
      orderer,
      ordererGroup,
      ordererMsp: mspOf(ordererGroup.msp),
    });
  }
  entities.push(...channels);

  return entities;
}

export function entityDependencies(entity: Entity): string[] {
  switch (entity.kind) {
    case "ca":
      return entity.parent ? [entity.parent.name] : [];
    case "msp":
      return [entity.ca.name];
    case "orderer":
      // configtxgen reads every org MSP when writing the genesis block
      return [
        entity.msp.name,
        ...entity.genesisMsps
          .map((msp) => msp.name)
          .filter((name) => name !== entity.msp.name),
      ];
    case "peer":
      return [entity.msp.name];
    case "channel":
      return [...entity.group.names, entity.orderer];
  }
}

export function buildDependencyGraph(topology: Topology): DependencyGraph {
  return graphOf(topologyEntities(topology));
}

function graphOf(entities: Entity[]): DependencyGraph {
  const byName = new Map<string, Entity>();
  const dependencies = new Map<string, string[]>();
  const dependents = new Map<string, string[]>();

  for (const entity of entities) {
    byName.set(entity.name, entity);
    dependencies.set(entity.name, entityDependencies(entity));
    dependents.set(entity.name, []);
  }

  for (const [name, deps] of dependencies) {
    for (const dep of deps) dependents.get(dep)?.push(name);
  }

  return { entities, byName, dependencies, dependents };
}

/**
 * Returns the path of the first dependency cycle found (first node repeated
 * at the end, e.g. `[a, b, a]`), or undefined when the graph is acyclic.
 */
export function findCycle(graph: DependencyGraph): string[] | undefined {
  const visiting = new Set<string>();
  const done = new Set<string>();
  const stack: string[] = [];

  const visit = (name: string): string[] | undefined => {
    if (done.has(name)) return undefined;
    if (visiting.has(name)) return [...stack.slice(stack.indexOf(name)), name];

    visiting.add(name);
    stack.push(name);
    for (const dep of graph.dependencies.get(name) || []) {
      if (!graph.byName.has(dep)) continue;
      const cycle = visit(dep);
      if (cycle) return cycle;
    }
    stack.pop();
    visiting.delete(name);
    done.add(name);
    return undefined;
  };

  for (const entity of graph.entities) {
    const cycle = visit(entity.name);
    if (cycle) return cycle;
  }
  return undefined;
}

/**
 * Group entities in levels: every entity sits one level after its deepest
 * dependency. Inside a level declaration order is kept.
 */
export function dependencyLevels(graph: DependencyGraph): Entity[][] {
  const cycle = findCycle(graph);
  if (cycle)
    throw new ValidationError([`dependency cycle: ${cycle.join(" -> ")}`]);

  const depth = new Map<string, number>();
  const depthOf = (name: string): number => {
    const known = depth.get(name);
    if (known !== undefined) return known;

    const deps = (graph.dependencies.get(name) || []).filter((dep) =>
      graph.byName.has(dep),
    );
    const level = deps.length ? Math.max(...deps.map(depthOf)) + 1 : 0;
    depth.set(name, level);
    return level;
  };

  const levels: Entity[][] = [];
  for (const entity of graph.entities) {
    const level = depthOf(entity.name);
    while (levels.length <= level) levels.push([]);
    levels[level].push(entity);
  }

  debug(`levels: ${levels.map((l) => l.map((e) => e.name).join(",")).join(" | ")}`);
  return levels;
}

/**
 * Kahn's algorithm; among the entities ready to go the earliest declared
 * wins, so the order is the same on every run.
 */
export function topologicalOrder(graph: DependencyGraph): Entity[] {
  const index = new Map<string, number>(
    graph.entities.map((entity, i) => [entity.name, i]),
  );
  const remaining = new Map<string, number>();
  for (const entity of graph.entities) {
    const deps = (graph.dependencies.get(entity.name) || []).filter((dep) =>
      graph.byName.has(dep),
    );
    remaining.set(entity.name, deps.length);
  }

  const ready = graph.entities.filter((e) => remaining.get(e.name) === 0);
  const order: Entity[] = [];

  while (ready.length) {
    ready.sort((a, b) => (index.get(a.name) || 0) - (index.get(b.name) || 0));
    const next = ready.shift();
    if (!next) break;
    order.push(next);

    for (const dependent of graph.dependents.get(next.name) || []) {
      const left = (remaining.get(dependent) || 0) - 1;
      remaining.set(dependent, left);
      const entity = graph.byName.get(dependent);
      if (left === 0 && entity) ready.push(entity);
    }
  }

  if (order.length !== graph.entities.length) {
    const cycle = findCycle(graph) || [];
    throw new ValidationError([`dependency cycle: ${cycle.join(" -> ")}`]);
  }
  return order;
}

/** Sub-graph with the targets and everything they transitively depend on. */
export function restrictTo(
  graph: DependencyGraph,
  targets: readonly string[],
): DependencyGraph {
  const unknown = targets.filter((target) => !graph.byName.has(target));
  if (unknown.length)
    throw new ValidationError(
      unknown.map((target) => `unknown target "${target}"`),
    );

  const keep = new Set<string>();
  const add = (name: string) => {
    if (keep.has(name)) return;
    keep.add(name);
    for (const dep of graph.dependencies.get(name) || []) add(dep);
  };
  targets.forEach(add);

  return graphOf(graph.entities.filter((entity) => keep.has(entity.name)));
}
