import { z } from "zod";
import { CheckpointFormatError } from "./errors.js";

export type SignalType = "Real" | "Integer" | "Boolean";
export type Signal = number | boolean;
export type SignalMap = Record<string, Signal>;

export type PortSpec = {
  name: string;
  type: SignalType;
  /** Value used when nothing is connected; ports without one must be connected. */
  default?: Signal;
  description?: string;
};

export type StepContext = {
  /** Instant the step is evaluated at. */
  time: number;
  /** Nominal increment between steps. */
  dt: number;
  /** Number of steps completed before this one. */
  step: number;
};

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type StateRecord = { [key: string]: JsonValue };

/** A stateful block's committed state, addressable for checkpoints. */
export type StateSlot = {
  id: string;
  read(): StateRecord;
  /** Validates `raw` and returns a thunk that installs it, so restores can be all-or-nothing. */
  prepare(raw: unknown): () => void;
};

/** What generated artifacts need from an embedded instance. */
export type Steppable = {
  evaluate(inputs: SignalMap, ctx: StepContext): SignalMap;
  commit(): void;
  discard(): void;
};

export type Block = Steppable & {
  readonly inputs: readonly PortSpec[];
  readonly outputs: readonly PortSpec[];
  stateSlots(prefix: string): StateSlot[];
};

export type PortLists = {
  inputs: readonly PortSpec[];
  outputs: readonly PortSpec[];
};

export type BlockType = {
  type: string;
  description: string;
  /** Ports of an instance built with default parameters; see `portsFor`. */
  inputs: readonly PortSpec[];
  outputs: readonly PortSpec[];
  stateful: boolean;
  /** Parameters that set the port count. Documents must give them as literals. */
  structural: readonly string[];
  /** Ports of an instance with these (already checked) parameters. */
  portsFor(params: Record<string, Signal>): PortLists;
  /** Validates an instance's parameters; failures carry the zod issue list. */
  checkParameters(params: Record<string, Signal>): z.SafeParseReturnType<unknown, unknown>;
  create(params: Record<string, Signal>): Block;
};

export type EvaluateArgs<P> = {
  inputs: SignalMap;
  params: P;
  ctx: StepContext;
};

export type BlockDefinition<P> = {
  type: string;
  description: string;
  parameters: z.ZodType<P, z.ZodTypeDef, unknown>;
  inputs: PortSpec[];
  outputs: PortSpec[];
  structural?: readonly string[];
  /** Replaces `inputs`/`outputs` for blocks whose port count is a parameter. */
  ports?: (params: P) => PortLists;
  evaluate(args: EvaluateArgs<P>): SignalMap;
};

export type StatefulBlockDefinition<P, S extends StateRecord> = Omit<BlockDefinition<P>, "evaluate"> & {
  state: z.ZodType<S, z.ZodTypeDef, unknown>;
  initial(params: P): S;
  /** Reads `state` (the committed pre-state) and returns the outputs plus the next state to stage. */
  evaluate(args: EvaluateArgs<P> & { state: S }): { outputs: SignalMap; next: S };
};

/**
 * Committed/staged double buffer. Readers only ever see `committed`; a value
 * staged during evaluate becomes visible after `commit`.
 */
export class StateCell<S> {
  private staged: { value: S } | undefined;

  constructor(private committed: S) {}

  read(): S {
    return this.committed;
  }

  stage(value: S): void {
    this.staged = { value };
  }

  commit(): void {
    if (!this.staged) return;
    this.committed = this.staged.value;
    this.staged = undefined;
  }

  discard(): void {
    this.staged = undefined;
  }

  reset(value: S): void {
    this.committed = value;
    this.staged = undefined;
  }

  hasStaged(): boolean {
    return this.staged !== undefined;
  }
}

class StatelessBlock<P> implements Block {
  readonly inputs: readonly PortSpec[];
  readonly outputs: readonly PortSpec[];

  constructor(
    private readonly def: BlockDefinition<P>,
    private readonly params: P,
  ) {
    const ports = def.ports?.(params) ?? def;
    this.inputs = ports.inputs;
    this.outputs = ports.outputs;
  }

  evaluate(inputs: SignalMap, ctx: StepContext): SignalMap {
    return this.def.evaluate({ inputs, params: this.params, ctx });
  }

  commit(): void {}

  discard(): void {}

  stateSlots(): StateSlot[] {
    return [];
  }
}

class StatefulBlock<P, S extends StateRecord> implements Block {
  readonly inputs: readonly PortSpec[];
  readonly outputs: readonly PortSpec[];
  private readonly cell: StateCell<S>;

  constructor(
    private readonly def: StatefulBlockDefinition<P, S>,
    private readonly params: P,
  ) {
    const ports = def.ports?.(params) ?? def;
    this.inputs = ports.inputs;
    this.outputs = ports.outputs;
    this.cell = new StateCell(def.initial(params));
  }

  evaluate(inputs: SignalMap, ctx: StepContext): SignalMap {
    const res = this.def.evaluate({ inputs, params: this.params, ctx, state: this.cell.read() });
    this.cell.stage(res.next);
    return res.outputs;
  }

  commit(): void {
    this.cell.commit();
  }

  discard(): void {
    this.cell.discard();
  }

  stateSlots(prefix: string): StateSlot[] {
    const { cell, def } = this;
    return [
      {
        id: prefix,
        read: () => ({ ...cell.read() }),
        prepare: (raw) => {
          const parsed = def.state.safeParse(raw);
          if (!parsed.success) {
            const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
            throw new CheckpointFormatError(`state of '${prefix}' (${def.type}) is invalid: ${detail}`);
          }
          return () => cell.reset(parsed.data);
        },
      },
    ];
  }
}

function blockType<P>(
  def: Omit<BlockDefinition<P>, "evaluate">,
  stateful: boolean,
  create: (params: P) => Block,
): BlockType {
  return {
    type: def.type,
    description: def.description,
    inputs: def.inputs,
    outputs: def.outputs,
    stateful,
    structural: def.structural ?? [],
    portsFor: (raw) => {
      const parsed = def.parameters.safeParse(raw);
      if (!parsed.success || !def.ports) return { inputs: def.inputs, outputs: def.outputs };
      return def.ports(parsed.data);
    },
    checkParameters: (params) => def.parameters.safeParse(params),
    create: (raw) => create(def.parameters.parse(raw)),
  };
}

export function defineBlock<P>(def: BlockDefinition<P>): BlockType {
  return blockType(def, false, (params) => new StatelessBlock(def, params));
}

export function defineStatefulBlock<P, S extends StateRecord>(def: StatefulBlockDefinition<P, S>): BlockType {
  return blockType(def, true, (params) => new StatefulBlock(def, params));
}
