import type { Logger } from '@edge-sim/common';
import { BaseStation, NetworkLink } from './model.js';

// ============================================================================
// Interfaces
// ============================================================================

interface AdjacencyEntry {
  neighbor: number;
  link: NetworkLink;
}

/** Shortest-delay route from one base station to another. */
export interface Route {
  delay: number;
  // Lowest link bandwidth along the route; Infinity for the empty route.
  bottleneckBandwidth: number;
  stationIds: number[];
  linkIds: number[];
}

// ============================================================================
// Network Topology
// ============================================================================

/**
 * Undirected graph of base stations and links. All-pairs shortest paths are
 * computed once at construction (Dijkstra from every station, weighted by
 * link delay) and served from the cache afterwards.
 */
export class NetworkTopology {
  private stations: Map<number, BaseStation> = new Map();
  private links: NetworkLink[] = [];
  private adjacencyList: Map<number, AdjacencyEntry[]> = new Map();
  private routes: Map<number, Map<number, Route>> = new Map();

  constructor(
    stations: BaseStation[],
    links: NetworkLink[],
    private logger: Logger
  ) {
    stations.forEach(station => this.stations.set(station.id, station));
    this.links = links;

    this.buildGraph();
    this.computeAllRoutes();
  }

  /**
   * Builds an adjacency list with one entry per direction for every link
   */
  private buildGraph(): void {
    this.adjacencyList.clear();
    this.stations.forEach((_, stationId) => {
      this.adjacencyList.set(stationId, []);
    });

    for (const link of this.links) {
      const [u, v] = link.endpoints;
      this.neighborsOf(u.id).push({ neighbor: v.id, link });
      this.neighborsOf(v.id).push({ neighbor: u.id, link });
    }

    let totalEdges = 0;
    this.adjacencyList.forEach(neighbors => {
      totalEdges += neighbors.length;
    });

    this.logger.debug(`[Topology] Adjacency list built: ${this.adjacencyList.size} stations, ${totalEdges} directed edges`);
  }

  private computeAllRoutes(): void {
    this.routes.clear();
    for (const stationId of this.stations.keys()) {
      this.routes.set(stationId, this.shortestRoutesFrom(stationId));
    }
    this.verifyConnectivity();
  }

  /**
   * Dijkstra from a single source. Queue entries are ordered by distance and
   * then by station id so that equal-delay routes resolve the same way on
   * every run.
   */
  private shortestRoutesFrom(src: number): Map<number, Route> {
    const distances = new Map<number, number>();
    const previous = new Map<number, AdjacencyEntry & { from: number }>();
    const visited = new Set<number>();

    this.stations.forEach((_, stationId) => distances.set(stationId, Infinity));
    distances.set(src, 0);

    // [distance, stationId]
    const priorityQueue: [number, number][] = [[0, src]];

    while (priorityQueue.length > 0) {
      priorityQueue.sort((a, b) => a[0] - b[0] || a[1] - b[1]);
      const head = priorityQueue.shift();
      if (head === undefined) {
        break;
      }
      const [currentDist, currentStation] = head;

      if (visited.has(currentStation)) {
        continue;
      }
      visited.add(currentStation);

      for (const entry of this.neighborsOf(currentStation)) {
        if (visited.has(entry.neighbor)) {
          continue;
        }

        const newDist = currentDist + entry.link.delay;
        const oldDist = distances.get(entry.neighbor) ?? Infinity;

        if (newDist < oldDist) {
          distances.set(entry.neighbor, newDist);
          previous.set(entry.neighbor, { ...entry, from: currentStation });
          priorityQueue.push([newDist, entry.neighbor]);
        }
      }
    }

    const routes = new Map<number, Route>();
    distances.forEach((delay, dst) => {
      if (delay === Infinity) {
        return;
      }

      const stationIds = [dst];
      const linkIds: number[] = [];
      let bottleneckBandwidth = Infinity;
      let current = previous.get(dst);

      while (current !== undefined) {
        bottleneckBandwidth = Math.min(bottleneckBandwidth, current.link.bandwidth);
        stationIds.unshift(current.from);
        linkIds.unshift(current.link.id);
        current = previous.get(current.from);
      }

      routes.set(dst, { delay, bottleneckBandwidth, stationIds, linkIds });
    });

    return routes;
  }

  private verifyConnectivity(): void {
    const expected = this.stations.size;
    const disconnected = Array.from(this.routes.entries()).filter(([, routes]) => routes.size < expected);

    if (disconnected.length > 0) {
      this.logger.warn(
        `[Topology] Graph is not fully connected: ${disconnected.length} of ${expected} stations cannot reach every other station`
      );
    } else {
      this.logger.debug(`[Topology] Connectivity verified across ${expected} stations`);
    }
  }

  private neighborsOf(stationId: number): AdjacencyEntry[] {
    let neighbors = this.adjacencyList.get(stationId);
    if (neighbors === undefined) {
      neighbors = [];
      this.adjacencyList.set(stationId, neighbors);
    }
    return neighbors;
  }

  // ============================================================================
  // Accessors
  // ============================================================================

  /**
   * Cached shortest route, or undefined when the stations are disconnected
   */
  route(from: BaseStation, to: BaseStation): Route | undefined {
    return this.routes.get(from.id)?.get(to.id);
  }

  /**
   * Shortest-path delay between two stations; Infinity when unreachable
   */
  pathDelay(from: BaseStation, to: BaseStation): number {
    return this.route(from, to)?.delay ?? Infinity;
  }

  /**
   * First pair of stations with no route between them, if any
   */
  findDisconnectedPair(): [BaseStation, BaseStation] | undefined {
    for (const [from, routes] of this.routes) {
      for (const [to, station] of this.stations) {
        if (!routes.has(to)) {
          const origin = this.stations.get(from);
          return origin === undefined ? undefined : [origin, station];
        }
      }
    }
    return undefined;
  }

  getStats(): { stations: number; links: number } {
    return {
      stations: this.stations.size,
      links: this.links.length,
    };
  }
}
