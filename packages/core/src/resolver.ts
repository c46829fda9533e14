import { injectable, inject } from 'inversify';
import type { ITicketClient } from './client';
import type { ILogger } from './logger';
import { TYPES } from './tokens';
import type { ExportNode, ExportScope, Ticket } from './types';

export interface IHierarchyResolver {
  resolve(scope: ExportScope): Promise<ExportNode[]>;
}

interface PendingNode {
  ticket: Ticket;
  parentKey: string | null;
  depth: number;
}

@injectable()
export class HierarchyResolver implements IHierarchyResolver {
  constructor(
    @inject(TYPES.ITicketClient) private client: ITicketClient,
    @inject(TYPES.ILogger) private logger: ILogger
  ) {}

  async resolve(scope: ExportScope): Promise<ExportNode[]> {
    if (scope.kind === 'project') {
      return this.resolveProject(scope.projectKey);
    }

    const root = await this.client.fetchTicket(scope.key);
    if (!scope.recursive) {
      return [{ ticket: root, parentKey: null, childKeys: [], depth: 0 }];
    }

    const visited = new Set<string>([root.key]);
    return this.walk([root], ticket => this.client.fetchChildren(ticket.key), visited);
  }

  private async resolveProject(projectKey: string): Promise<ExportNode[]> {
    const fetched = await this.client.fetchProject(projectKey);

    // Pagination can hand back the same issue twice; the first copy wins
    const byKey = new Map<string, Ticket>();
    for (const ticket of fetched) {
      if (!byKey.has(ticket.key)) byKey.set(ticket.key, ticket);
    }
    const tickets = [...byKey.values()];

    const children = new Map<string, Ticket[]>();
    const roots: Ticket[] = [];
    for (const ticket of tickets) {
      const parentKey = ticket.parent?.key;
      if (parentKey && parentKey !== ticket.key && byKey.has(parentKey)) {
        const siblings = children.get(parentKey) ?? [];
        siblings.push(ticket);
        children.set(parentKey, siblings);
      } else {
        if (parentKey && parentKey !== ticket.key) {
          this.logger.debug(`${ticket.key}: parent ${parentKey} is outside the export, placing at top level`);
        }
        roots.push(ticket);
      }
    }

    const childrenOf = async (ticket: Ticket): Promise<Ticket[]> => children.get(ticket.key) ?? [];
    const visited = new Set<string>(roots.map(root => root.key));
    const nodes = await this.walk(roots, childrenOf, visited);

    // Whatever is left sits on a parent cycle and never hangs off a root
    for (const ticket of tickets) {
      if (visited.has(ticket.key)) continue;
      this.logger.warn(`${ticket.key} is part of a parent cycle, exporting it at top level`);
      visited.add(ticket.key);
      nodes.push(...(await this.walk([ticket], childrenOf, visited)));
    }

    return nodes;
  }

  /**
   * Depth-first, parent-before-child walk with an explicit stack.
   * `visited` must already contain the root keys; every key is emitted once.
   */
  private async walk(
    roots: Ticket[],
    childrenOf: (ticket: Ticket) => Promise<Ticket[]>,
    visited: Set<string>
  ): Promise<ExportNode[]> {
    const nodes: ExportNode[] = [];
    const stack: PendingNode[] = [...roots].reverse().map(ticket => ({ ticket, parentKey: null, depth: 0 }));

    let pending = stack.pop();
    while (pending) {
      const { ticket, parentKey, depth } = pending;
      const fresh: Ticket[] = [];
      for (const child of await childrenOf(ticket)) {
        if (visited.has(child.key)) {
          this.logger.debug(`${child.key} already exported, skipping repeat under ${ticket.key}`);
          continue;
        }
        visited.add(child.key);
        fresh.push(child);
      }

      nodes.push({ ticket, parentKey, childKeys: fresh.map(child => child.key), depth });
      for (let i = fresh.length - 1; i >= 0; i--) {
        stack.push({ ticket: fresh[i], parentKey: ticket.key, depth: depth + 1 });
      }
      pending = stack.pop();
    }

    return nodes;
  }
}
