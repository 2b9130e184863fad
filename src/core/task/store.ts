import type { CapabilitySet } from '../capability/set.js';
import { TaskIdGenerator } from '../../utils/id.js';
import { canTransition, TERMINAL_STATUSES, type TaskNode, type TaskOutcome, type TaskStatus } from './types.js';

export interface NewTask {
  roleId: string;
  parentId: string | null;
  task: string;
  grant: CapabilitySet;
}

/**
 * Flat arena of in-flight tasks keyed by id. Parent links are ids, never object references;
 * the tree is walked by following `parentId`.
 */
export class TaskStore {
  private readonly nodes = new Map<string, TaskNode>();
  private readonly ids = new TaskIdGenerator();

  create(input: NewTask): TaskNode {
    const parent = input.parentId ? this.get(input.parentId) : null;
    const controller = new AbortController();
    const node: TaskNode = {
      id: this.ids.next(),
      roleId: input.roleId,
      parentId: input.parentId,
      task: input.task,
      delegationDepth: parent ? parent.delegationDepth + 1 : 0,
      grant: input.grant,
      controller,
      signal: controller.signal,
      status: 'pending',
      result: null,
      audit: [],
      delegations: [],
      createdAtIso: new Date().toISOString(),
      deadline: null
    };
    this.nodes.set(node.id, node);
    return node;
  }

  get(id: string): TaskNode {
    const node = this.nodes.get(id);
    if (!node) throw new Error(`Unknown task '${id}'`);
    return node;
  }

  find(id: string): TaskNode | undefined {
    return this.nodes.get(id);
  }

  get size(): number {
    return this.nodes.size;
  }

  transition(id: string, to: TaskStatus): TaskNode {
    const node = this.get(id);
    if (!canTransition(node.status, to)) {
      throw new Error(`Illegal task transition ${node.status} -> ${to} for '${id}'`);
    }
    node.status = to;
    return node;
  }

  /** Records the outcome and moves the task to its terminal status. */
  settle(id: string, outcome: TaskOutcome): TaskNode {
    const node = this.transition(id, outcome.ok ? 'succeeded' : 'failed');
    node.result = outcome;
    if (node.deadline) {
      clearTimeout(node.deadline);
      node.deadline = null;
    }
    return node;
  }

  isTerminal(id: string): boolean {
    const node = this.nodes.get(id);
    return !node || TERMINAL_STATUSES.has(node.status);
  }

  /** Nearest first: parent, grandparent, ... root. */
  ancestors(id: string): TaskNode[] {
    const out: TaskNode[] = [];
    let cur = this.get(id).parentId;
    while (cur) {
      const node = this.nodes.get(cur);
      if (!node) break;
      out.push(node);
      cur = node.parentId;
    }
    return out;
  }

  /** Role ids from the root down to `id`. */
  chain(id: string): string[] {
    const node = this.nodes.get(id);
    if (!node) return [];
    return [...this.ancestors(id).reverse().map((n) => n.roleId), node.roleId];
  }

  /** Every live descendant of `id`, deepest first. */
  descendants(id: string): TaskNode[] {
    const out: TaskNode[] = [];
    for (const node of this.nodes.values()) {
      if (node.id === id) continue;
      if (this.isDescendantOf(node, id)) out.push(node);
    }
    return out.sort((a, b) => b.delegationDepth - a.delegationDepth);
  }

  evict(id: string): void {
    const node = this.nodes.get(id);
    if (!node) return;
    if (!TERMINAL_STATUSES.has(node.status)) throw new Error(`Cannot evict open task '${id}'`);
    this.nodes.delete(id);
  }

  private isDescendantOf(node: TaskNode, ancestorId: string): boolean {
    let cur = node.parentId;
    while (cur) {
      if (cur === ancestorId) return true;
      cur = this.nodes.get(cur)?.parentId ?? null;
    }
    return false;
  }
}
