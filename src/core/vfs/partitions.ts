import path from "path";
import { ValidationError } from "../errors";

/**
 * Named physical roots that routes resolve against.
 * Every stored root is absolute; registering a name again replaces its root.
 */
export class PartitionTable {
  private roots: Map<string, string> = new Map();

  constructor(initial: Record<string, string> = {}) {
    for (const [name, root] of Object.entries(initial)) {
      this.register(name, root);
    }
  }

  register(name: string, root: string): void {
    if (!name) {
      throw new ValidationError("Partition name must not be empty");
    }
    if (!path.isAbsolute(root)) {
      throw new ValidationError(`Partition root must be absolute: ${root}`, {
        partition: name,
        root,
      });
    }
    this.roots.set(name, path.resolve(root));
  }

  get(name: string): string | undefined {
    return this.roots.get(name);
  }

  has(name: string): boolean {
    return this.roots.has(name);
  }

  names(): string[] {
    return Array.from(this.roots.keys());
  }

  toJSON(): Record<string, string> {
    return Object.fromEntries(this.roots);
  }

  get size(): number {
    return this.roots.size;
  }
}
