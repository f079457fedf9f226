import type { Block, BlockType, Signal } from "../block.js";
import { MalformedDocumentError, UnresolvedReferenceError } from "../errors.js";
import { die } from "../util.js";
import { conversionBlocks } from "./conversions.js";
import { discreteBlocks } from "./discrete.js";
import { integerBlocks } from "./integers.js";
import { logicalBlocks } from "./logical.js";
import { psychrometricBlocks } from "./psychrometrics.js";
import { realBlocks } from "./reals.js";
import { routingBlocks } from "./routing.js";

export const BUILTIN_LOCATION = "<built-in catalogue>";

function stripNamespace(typeName: string): string {
  const hash = typeName.lastIndexOf("#");
  if (hash >= 0) return typeName.slice(hash + 1);
  const colon = typeName.indexOf(":");
  return colon >= 0 ? typeName.slice(colon + 1) : typeName;
}

/**
 * `Buildings.Controls.OBC.CDL.Reals.Add` and `CDL.Reals.Add` both name the
 * catalogue entry `Reals.Add`; a reference without a `CDL` segment is returned
 * unchanged.
 */
export function elementaryName(typeName: string): { name: string; qualified: boolean } {
  const parts = stripNamespace(typeName).split(".");
  const idx = parts.lastIndexOf("CDL");
  if (idx < 0) return { name: parts.join("."), qualified: false };
  return { name: parts.slice(idx + 1).join("."), qualified: true };
}

/** `ex:SubController` and `http://example.org#Pkg.SubController` are both `SubController`. */
export function compositeName(typeName: string): string {
  const parts = stripNamespace(typeName).split(".");
  return parts[parts.length - 1] ?? typeName;
}

export class BlockCatalog {
  private readonly types = new Map<string, BlockType>();

  constructor(types: BlockType[] = []) {
    for (const t of types) this.register(t);
  }

  register(t: BlockType): void {
    if (this.types.has(t.type)) die(`block type '${t.type}' registered twice`);
    this.types.set(t.type, t);
  }

  /**
   * Returns the elementary type a reference names, or undefined when the
   * reference is a composite. A `CDL`-qualified name missing from the
   * catalogue cannot be a composite and fails immediately.
   */
  lookup(typeName: string): BlockType | undefined {
    const { name, qualified } = elementaryName(typeName);
    const found = this.types.get(name);
    if (found) return found;
    if (qualified) throw new UnresolvedReferenceError(typeName, [BUILTIN_LOCATION]);
    return undefined;
  }

  list(): string[] {
    return [...this.types.keys()].sort();
  }
}

export const defaultCatalog = new BlockCatalog([
  ...realBlocks,
  ...integerBlocks,
  ...logicalBlocks,
  ...discreteBlocks,
  ...conversionBlocks,
  ...routingBlocks,
  ...psychrometricBlocks,
]);

/** Instantiates a catalogue block; generated artifacts build their elementary instances through this. */
export function createElementary(typeName: string, params: Record<string, Signal> = {}, catalog = defaultCatalog): Block {
  const type = catalog.lookup(typeName);
  if (!type) throw new UnresolvedReferenceError(typeName, [BUILTIN_LOCATION]);
  const checked = type.checkParameters(params);
  if (!checked.success) {
    const issue = checked.error.issues[0];
    throw new MalformedDocumentError(typeName, `parameters.${issue?.path.join(".") ?? ""}`, issue?.message ?? "invalid");
  }
  return type.create(params);
}
