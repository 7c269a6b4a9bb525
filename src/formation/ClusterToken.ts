import { FormationError } from '../common/errors';

/**
 * Join secret read from the primary once it has bootstrapped. Immutable;
 * formatting it never reveals the value.
 */
export class ClusterToken {
  private readonly value: string;

  private constructor(value: string) {
    this.value = value;
    Object.freeze(this);
  }

  static fromFileContent(node: string, content: string): ClusterToken {
    const value = content.trim();
    if (value.length === 0 || /\s/.test(value)) {
      throw new FormationError(node, `Cluster token read from ${node} is empty or malformed`);
    }
    return new ClusterToken(value);
  }

  get length(): number {
    return this.value.length;
  }

  reveal(): string {
    return this.value;
  }

  toString(): string {
    return `ClusterToken(length=${this.value.length})`;
  }

  toJSON(): string {
    return this.toString();
  }
}
