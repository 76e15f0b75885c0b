/**
 * Binary min-heap of flat cell indices keyed by priority.
 *
 * Parallel typed arrays instead of node objects; grows by doubling when the
 * capacity hint is exceeded. Equal priorities pop in heap order, which is
 * deterministic for a given push sequence.
 */
export class Frontier {
  private priorities: Float64Array;
  private nodes: Int32Array;
  private length = 0;

  constructor(capacity: number = 16) {
    const size = Math.max(1, Math.floor(capacity));
    this.priorities = new Float64Array(size);
    this.nodes = new Int32Array(size);
  }

  get size(): number {
    return this.length;
  }

  get isEmpty(): boolean {
    return this.length === 0;
  }

  get capacity(): number {
    return this.nodes.length;
  }

  push(node: number, priority: number): void {
    if (this.length === this.nodes.length) {
      this.grow();
    }
    this.bubbleUp(this.length, node, priority);
    this.length++;
  }

  /**
   * Remove and return the node with the lowest priority, or -1 when empty.
   */
  pop(): number {
    if (this.length === 0) {
      return -1;
    }

    const best = this.nodes[0] ?? -1;
    this.length--;

    if (this.length > 0) {
      const tailNode = this.nodes[this.length] ?? -1;
      const tailPriority = this.priorities[this.length] ?? Infinity;
      this.bubbleDown(tailNode, tailPriority);
    }

    return best;
  }

  private grow(): void {
    const priorities = new Float64Array(this.nodes.length * 2);
    const nodes = new Int32Array(this.nodes.length * 2);
    priorities.set(this.priorities);
    nodes.set(this.nodes);
    this.priorities = priorities;
    this.nodes = nodes;
  }

  private bubbleUp(startIndex: number, node: number, priority: number): void {
    let index = startIndex;

    while (index > 0) {
      const parent = (index - 1) >> 1;
      const parentPriority = this.priorities[parent] ?? -Infinity;
      if (parentPriority <= priority) break;

      this.priorities[index] = parentPriority;
      this.nodes[index] = this.nodes[parent] ?? -1;
      index = parent;
    }

    this.priorities[index] = priority;
    this.nodes[index] = node;
  }

  private bubbleDown(node: number, priority: number): void {
    let index = 0;

    while (true) {
      const left = index * 2 + 1;
      const right = left + 1;
      if (left >= this.length) break;

      let bestChild = left;
      let bestPriority = this.priorities[left] ?? Infinity;

      if (right < this.length) {
        const rightPriority = this.priorities[right] ?? Infinity;
        if (rightPriority < bestPriority) {
          bestChild = right;
          bestPriority = rightPriority;
        }
      }

      if (priority <= bestPriority) break;

      this.priorities[index] = bestPriority;
      this.nodes[index] = this.nodes[bestChild] ?? -1;
      index = bestChild;
    }

    this.priorities[index] = priority;
    this.nodes[index] = node;
  }
}
