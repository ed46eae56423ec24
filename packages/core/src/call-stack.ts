/**
 * minipas runtime frames.
 */
import type { Value } from "./values.js";

export type ARType = "PROGRAM" | "PROCEDURE";

export interface ActivationRecordJSON {
  name: string;
  type: ARType;
  nestingLevel: number;
  scopeLevel: number;
  members: Record<string, Value>;
}

export class ActivationRecord {
  readonly name: string;
  readonly type: ARType;
  /** Dynamic depth: 1 for the program frame, one more per active call. */
  readonly nestingLevel: number;
  /** Static depth of the scope whose body runs in this frame. */
  readonly scopeLevel: number;
  /** Frame of the lexically enclosing scope; null for the program frame. */
  readonly accessLink: ActivationRecord | null;
  private readonly members = new Map<string, Value>();

  constructor(
    name: string,
    type: ARType,
    nestingLevel: number,
    scopeLevel: number,
    accessLink: ActivationRecord | null = null
  ) {
    this.name = name;
    this.type = type;
    this.nestingLevel = nestingLevel;
    this.scopeLevel = scopeLevel;
    this.accessLink = accessLink;
  }

  set(name: string, value: Value): void {
    this.members.set(name, value);
  }

  get(name: string): Value | undefined {
    return this.members.get(name);
  }

  entries(): Array<[string, Value]> {
    return [...this.members.entries()];
  }

  toJSON(): ActivationRecordJSON {
    return {
      name: this.name,
      type: this.type,
      nestingLevel: this.nestingLevel,
      scopeLevel: this.scopeLevel,
      members: Object.fromEntries(this.members),
    };
  }
}

export class CallStack {
  private readonly frames: ActivationRecord[] = [];

  push(record: ActivationRecord): void {
    this.frames.push(record);
  }

  pop(): ActivationRecord | undefined {
    return this.frames.pop();
  }

  peek(): ActivationRecord | undefined {
    return this.frames[this.frames.length - 1];
  }

  get depth(): number {
    return this.frames.length;
  }

  /** Bottom (program frame) first. */
  get records(): readonly ActivationRecord[] {
    return this.frames;
  }

  toJSON(): ActivationRecordJSON[] {
    return this.frames.map((f) => f.toJSON());
  }
}
