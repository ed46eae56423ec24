/**
 * minipas symbols and scoped symbol tables.
 */
import type { Block } from "./ast.js";
import { canonicalName } from "./names.js";
import type { TypeName } from "./values.js";

export interface BuiltinTypeSymbol {
  kind: "BuiltinType";
  name: TypeName;
}

export interface VariableSymbol {
  kind: "Variable";
  name: string;
  type: BuiltinTypeSymbol;
  /** Level of the scope the variable is declared in. */
  scopeLevel: number;
}

export interface ProcedureSymbol {
  kind: "Procedure";
  name: string;
  params: VariableSymbol[];
  block: Block;
  /** Level of the scope the procedure is declared in; its body runs one level deeper. */
  scopeLevel: number;
}

export type ScopeSymbol = BuiltinTypeSymbol | VariableSymbol | ProcedureSymbol;

export const BUILTIN_TYPES: readonly BuiltinTypeSymbol[] = [
  { kind: "BuiltinType", name: "INTEGER" },
  { kind: "BuiltinType", name: "REAL" },
];

/**
 * Names declared in one lexical block, chained to the table of the enclosing
 * block. A table never rejects a duplicate on its own: the analyzer checks with
 * a current-scope lookup before it inserts.
 */
export class SymbolTable {
  readonly scopeName: string;
  readonly scopeLevel: number;
  readonly enclosingScope: SymbolTable | null;
  private readonly entries = new Map<string, ScopeSymbol>();

  constructor(scopeName: string, scopeLevel: number, enclosingScope: SymbolTable | null = null) {
    this.scopeName = scopeName;
    this.scopeLevel = scopeLevel;
    this.enclosingScope = enclosingScope;
    for (const builtin of BUILTIN_TYPES) {
      this.insert(builtin);
    }
  }

  insert(symbol: ScopeSymbol): void {
    this.entries.set(canonicalName(symbol.name), symbol);
  }

  /**
   * Look up a canonical name, nearest scope first. With `currentScopeOnly` the
   * enclosing chain is not consulted.
   */
  lookup(name: string, currentScopeOnly = false): ScopeSymbol | undefined {
    let scope: SymbolTable | null = this;
    while (scope) {
      const found = scope.entries.get(name);
      if (found) return found;
      if (currentScopeOnly) return undefined;
      scope = scope.enclosingScope;
    }
    return undefined;
  }

  symbols(): ScopeSymbol[] {
    return [...this.entries.values()];
  }
}
