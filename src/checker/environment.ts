/**
 * Scope Environment
 *
 * A stack of lexical frames holding variable types and function
 * closures, searched innermost first. Closures capture a copy of the
 * frames that exist when they are registered; the frames themselves are
 * never shared between environments, only the Closure records are.
 */

import type { FunctionDefinition, TypeName } from '../types.js';
import { InternalError } from '../types.js';

/**
 * Check progress of a closure:
 * - unchecked: registered, body not walked yet
 * - checking: body walk in progress (recursive calls must not re-enter)
 * - checked: body walked at least once, return type settled
 */
export type ClosureState = 'unchecked' | 'checking' | 'checked';

export interface Closure {
  readonly name: string;
  readonly definition: FunctionDefinition;
  state: ClosureState;
  /** Environment captured at registration, extended with siblings */
  readonly envir: Environment;
  /** Id of the frame the function was declared in */
  readonly declScope: number;
}

export interface ScopeFrame {
  readonly id: number;
  readonly variables: Map<string, TypeName>;
  readonly functions: Map<string, Closure>;
}

/** Frame ids are unique across an environment and all its copies */
export interface IdSource {
  next: number;
}

function copyFrame(frame: ScopeFrame): ScopeFrame {
  return {
    id: frame.id,
    variables: new Map(frame.variables),
    functions: new Map(frame.functions),
  };
}

export class Environment {
  private readonly frames: ScopeFrame[];
  private readonly ids: IdSource;

  constructor();
  constructor(frames: ScopeFrame[], ids: IdSource);
  constructor(frames?: ScopeFrame[], ids?: IdSource) {
    this.ids = ids ?? { next: 0 };
    this.frames = frames ?? [this.newFrame()];
  }

  private newFrame(): ScopeFrame {
    return {
      id: this.ids.next++,
      variables: new Map(),
      functions: new Map(),
    };
  }

  private get top(): ScopeFrame {
    const frame = this.frames[this.frames.length - 1];
    if (!frame) {
      throw new InternalError('Environment has no frames');
    }
    return frame;
  }

  /** Id of the innermost frame */
  get currentScopeId(): number {
    return this.top.id;
  }

  /** Number of live frames, root included */
  get depth(): number {
    return this.frames.length;
  }

  // ============================================================
  // FRAMES
  // ============================================================

  /** Push a frame. Returns its id. */
  enterScope(): number {
    const frame = this.newFrame();
    this.frames.push(frame);
    return frame.id;
  }

  leaveScope(): void {
    if (this.frames.length <= 1) {
      throw new InternalError('Cannot leave the root scope');
    }
    this.frames.pop();
  }

  /**
   * Environment as it was at frame `scopeId`: copies of the frames from
   * the root up to and including it.
   */
  getScope(scopeId: number): Environment {
    const index = this.frames.findIndex((frame) => frame.id === scopeId);
    if (index === -1) {
      throw new InternalError(`Scope ${scopeId} is not live`);
    }
    return new Environment(
      this.frames.slice(0, index + 1).map(copyFrame),
      this.ids
    );
  }

  // ============================================================
  // VARIABLES
  // ============================================================

  /** True only when bound in the innermost frame */
  varExistsInScope(id: string): boolean {
    return this.top.variables.has(id);
  }

  /** Bind in the innermost frame. Redeclaration is the caller's check. */
  pushVariable(id: string, type: TypeName): void {
    this.top.variables.set(id, type);
  }

  lookupVar(id: string): TypeName | undefined {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const type = this.frames[i]?.variables.get(id);
      if (type !== undefined) return type;
    }
    return undefined;
  }

  // ============================================================
  // FUNCTIONS
  // ============================================================

  /** True only when bound in the innermost frame */
  funExistsInScope(id: string): boolean {
    return this.top.functions.has(id);
  }

  /**
   * Register an unchecked closure in the innermost frame. Its snapshot
   * sees only what is bound right now; see updateFunEnvirs.
   */
  pushFunction(name: string, definition: FunctionDefinition): Closure {
    const closure: Closure = {
      name,
      definition,
      state: 'unchecked',
      envir: this.getScope(this.top.id),
      declScope: this.top.id,
    };
    this.top.functions.set(name, closure);
    return closure;
  }

  /**
   * Link the innermost frame's functions into each other's snapshots so
   * functions declared together can call each other in any order.
   */
  updateFunEnvirs(): void {
    const siblings = [...this.top.functions.values()];
    for (const closure of siblings) {
      for (const sibling of siblings) {
        closure.envir.bindFunction(sibling);
      }
    }
  }

  private bindFunction(closure: Closure): void {
    this.top.functions.set(closure.name, closure);
  }

  /** Mark a closure as being checked. */
  declareFun(id: string): Closure | undefined {
    const closure = this.lookupFun(id);
    if (closure) {
      closure.state = 'checking';
    }
    return closure;
  }

  lookupFun(id: string): Closure | undefined {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const closure = this.frames[i]?.functions.get(id);
      if (closure) return closure;
    }
    return undefined;
  }
}
