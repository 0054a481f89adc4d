import path from "node:path";
import {
  type CompiledNameEntry,
  DanglingReferenceError,
} from "@webcompile/types";

export type RegisterInput = {
  /** Output path, absolute or relative to the root. */
  readonly outputPath: string;
  readonly hash: string;
};

const toPosix = (value: string): string => value.split(path.sep).join("/");

/**
 * Maps style and script sources to the outputs they compiled to during one
 * run. Templates read from it through `lookup`; the orchestrator seals it
 * before the template stage starts.
 */
export class CompiledNameRegistry {
  private readonly records = new Map<string, CompiledNameEntry>();
  private sealed = false;

  constructor(private readonly root: string) {}

  /** Root-relative POSIX key for an absolute or relative path. */
  keyFor(source: string): string {
    const absolute = path.resolve(this.root, source.replace(/\\/g, "/"));
    return toPosix(path.relative(this.root, absolute));
  }

  register(source: string, input: RegisterInput): void {
    if (this.sealed) {
      throw new Error(
        `Compiled name registry is sealed; cannot register ${this.keyFor(source)}`
      );
    }
    this.records.set(
      this.keyFor(source),
      Object.freeze({
        outputPath: this.keyFor(input.outputPath),
        hash: input.hash,
      })
    );
  }

  has(source: string): boolean {
    return this.records.has(this.keyFor(source));
  }

  readonly lookup = (source: string): CompiledNameEntry => {
    const entry = this.records.get(this.keyFor(source));
    if (!entry) {
      throw new DanglingReferenceError(source);
    }
    return entry;
  };

  entries(): ReadonlyMap<string, CompiledNameEntry> {
    return new Map(this.records);
  }

  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  get size(): number {
    return this.records.size;
  }
}
