/**
 * SearchTree — append-only store of the nodes created during one search run.
 *
 * Also renders the tree for inspection as JSON or Graphviz DOT.
 */

import { nanoid } from 'nanoid';
import { DuplicateRootError, NodeNotFoundError, UnknownParentError } from '../core/errors.js';
import { SearchNode, serializeNode, type SerializedNode } from './node.js';
import { policyScore, type TreePolicy } from './policy.js';

export interface SerializedTree {
  rootId: string;
  nodes: SerializedNode[];
}

export interface DotOptions {
  policy?: TreePolicy;
  /** Characters of node content shown per label. */
  maxContentLength?: number;
}

/**
 * Append-only store of every node created during one search run.
 *
 * Nodes are only ever added under a parent that already exists, so the
 * structure stays a single-rooted, acyclic tree.
 */
export class SearchTree {
  private nodes = new Map<string, SearchNode>();
  private rootId: string | null = null;

  constructor(private readonly idFactory: () => string = () => nanoid(10)) {}

  createRoot(content: string): SearchNode {
    if (this.rootId !== null) {
      throw new DuplicateRootError(this.rootId);
    }
    const node = new SearchNode(this.idFactory(), null, content, 0, 0);
    this.nodes.set(node.id, node);
    this.rootId = node.id;
    return node;
  }

  addChild(parentId: string, content: string): SearchNode {
    const parent = this.nodes.get(parentId);
    if (!parent) {
      throw new UnknownParentError(parentId);
    }
    const node = new SearchNode(this.idFactory(), parent.id, content, parent.depth + 1, this.nodes.size);
    this.nodes.set(node.id, node);
    parent.children.push(node.id);
    return node;
  }

  get(nodeId: string): SearchNode {
    const node = this.nodes.get(nodeId);
    if (!node) {
      throw new NodeNotFoundError(nodeId);
    }
    return node;
  }

  get root(): SearchNode {
    if (this.rootId === null) {
      throw new NodeNotFoundError('<root>');
    }
    return this.get(this.rootId);
  }

  get size(): number {
    return this.nodes.size;
  }

  /** All nodes in creation order. */
  all(): SearchNode[] {
    return [...this.nodes.values()];
  }

  childrenOf(nodeId: string): SearchNode[] {
    return this.get(nodeId).children.map((id) => this.get(id));
  }

  leaves(): SearchNode[] {
    return this.all().filter((node) => node.isLeaf);
  }

  /** Root first, target last. */
  pathToRoot(nodeId: string): SearchNode[] {
    const path: SearchNode[] = [];
    let current: SearchNode | undefined = this.get(nodeId);
    while (current) {
      path.push(current);
      current = current.parentId === null ? undefined : this.get(current.parentId);
    }
    return path.reverse();
  }

  /** Contents along the root-to-node path. */
  trajectory(nodeId: string): string[] {
    return this.pathToRoot(nodeId).map((node) => node.content);
  }

  equals(other: SearchTree): boolean {
    if (this.size !== other.size) return false;
    const mine = this.all();
    const theirs = other.all();
    return mine.every((node, index) => {
      const peer = theirs[index];
      const parentIndex = (tree: SearchTree, n: SearchNode) =>
        n.parentId === null ? -1 : tree.get(n.parentId).seq;
      return (
        node.content === peer.content &&
        node.visits === peer.visits &&
        node.totalReward === peer.totalReward &&
        node.terminal === peer.terminal &&
        parentIndex(this, node) === parentIndex(other, peer)
      );
    });
  }

  toJSON(): SerializedTree {
    return {
      rootId: this.root.id,
      nodes: this.all().map(serializeNode),
    };
  }

  /**
   * Render the tree as Graphviz DOT source. Each label lists the node's
   * visit count, mean reward, its tree-policy score without exploration and
   * the start of its content.
   */
  toDot(options: DotOptions = {}): string {
    const policy = options.policy ?? 'uct';
    const maxContentLength = options.maxContentLength ?? 60;
    const lines = ['digraph {'];

    for (const node of this.nodes.values()) {
      const attrs: string[] = [`n: ${node.visits}`, `q: ${formatNumber(node.meanReward)}`];
      if (node.parentId !== null) {
        const parent = this.get(node.parentId);
        const score = policyScore(policy, node, parent.visits, { explorationConstant: 0, epsilon: 1 });
        attrs.push(`${policy}: ${formatNumber(score)}`);
      }
      if (node.terminal) attrs.push('terminal: true');
      attrs.push(`content: "${truncate(node.content, maxContentLength)}"`);
      lines.push(`\t"${node.id}" [label="${attrs.map(escapeDot).join('\\n')}"]`);
    }

    for (const node of this.nodes.values()) {
      for (const childId of node.children) {
        lines.push(`\t"${node.id}" -> "${childId}"`);
      }
    }

    lines.push('}');
    return lines.join('\n') + '\n';
  }
}

function formatNumber(value: number | undefined): string {
  if (value === undefined) return '-';
  if (!Number.isFinite(value)) return value > 0 ? 'inf' : '-inf';
  return String(Math.round(value * 1000) / 1000);
}

function truncate(text: string, max: number): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > max ? `${flat.slice(0, max)}...` : flat;
}

function escapeDot(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}
