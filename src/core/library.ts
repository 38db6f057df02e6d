import { SpindleError } from "./errors.js";
import { createRandomSource, type RandomSource } from "./random.js";
import type { Declaration, ValueKind, YarnValue } from "./types.js";
import {
  formatValue,
  functionType,
  kindOf,
  primitiveType,
  toBoolean,
  toNumber,
  toStringValue,
} from "./value.js";
import { MemoryVariableStorage, type VariableStorage } from "./variable-storage.js";

export interface ValueParam<T extends YarnValue> {
  readonly kind: ValueKind;
  readonly convert: (value: YarnValue) => T | undefined;
}

export const numberParam: ValueParam<number> = { kind: "number", convert: toNumber };
export const stringParam: ValueParam<string> = { kind: "string", convert: toStringValue };
export const booleanParam: ValueParam<boolean> = { kind: "boolean", convert: toBoolean };

/**
 * A function callable from scripts. Parameter and return kinds are fixed
 * when the function is wrapped; `call` checks the argument list against
 * them before the native body runs.
 */
export interface LibraryFunction {
  readonly parameterKinds: readonly ValueKind[];
  readonly returnKind: ValueKind;
  call(args: readonly YarnValue[], name?: string): YarnValue;
}

const ANONYMOUS = "<anonymous>";

const checkArity = (name: string, args: readonly YarnValue[], arity: number): void => {
  if (args.length !== arity) {
    throw new SpindleError(
      "LIBRARY_ARITY_MISMATCH",
      `Function "${name}" expects ${arity} argument(s) but received ${args.length}.`
    );
  }
};

const convertArgument = <T extends YarnValue>(
  name: string,
  param: ValueParam<T>,
  args: readonly YarnValue[],
  index: number
): T => {
  const raw = args[index];
  const converted = param.convert(raw);
  if (converted === undefined) {
    throw new SpindleError(
      "LIBRARY_ARGUMENT_KIND",
      `Argument ${index + 1} of "${name}" must convert to ${param.kind}, got ${kindOf(raw)} ${JSON.stringify(formatValue(raw))}.`
    );
  }
  return converted;
};

export const function0 = <R extends YarnValue>(
  returns: ValueParam<R>,
  body: () => R
): LibraryFunction => ({
  parameterKinds: [],
  returnKind: returns.kind,
  call: (args, name = ANONYMOUS) => {
    checkArity(name, args, 0);
    return body();
  },
});

export const function1 = <A extends YarnValue, R extends YarnValue>(
  params: readonly [ValueParam<A>],
  returns: ValueParam<R>,
  body: (a: A) => R
): LibraryFunction => ({
  parameterKinds: params.map((param) => param.kind),
  returnKind: returns.kind,
  call: (args, name = ANONYMOUS) => {
    checkArity(name, args, 1);
    return body(convertArgument(name, params[0], args, 0));
  },
});

export const function2 = <A extends YarnValue, B extends YarnValue, R extends YarnValue>(
  params: readonly [ValueParam<A>, ValueParam<B>],
  returns: ValueParam<R>,
  body: (a: A, b: B) => R
): LibraryFunction => ({
  parameterKinds: params.map((param) => param.kind),
  returnKind: returns.kind,
  call: (args, name = ANONYMOUS) => {
    checkArity(name, args, 2);
    return body(
      convertArgument(name, params[0], args, 0),
      convertArgument(name, params[1], args, 1)
    );
  },
});

export const function3 = <
  A extends YarnValue,
  B extends YarnValue,
  C extends YarnValue,
  R extends YarnValue,
>(
  params: readonly [ValueParam<A>, ValueParam<B>, ValueParam<C>],
  returns: ValueParam<R>,
  body: (a: A, b: B, c: C) => R
): LibraryFunction => ({
  parameterKinds: params.map((param) => param.kind),
  returnKind: returns.kind,
  call: (args, name = ANONYMOUS) => {
    checkArity(name, args, 3);
    return body(
      convertArgument(name, params[0], args, 0),
      convertArgument(name, params[1], args, 1),
      convertArgument(name, params[2], args, 2)
    );
  },
});

export const function4 = <
  A extends YarnValue,
  B extends YarnValue,
  C extends YarnValue,
  D extends YarnValue,
  R extends YarnValue,
>(
  params: readonly [ValueParam<A>, ValueParam<B>, ValueParam<C>, ValueParam<D>],
  returns: ValueParam<R>,
  body: (a: A, b: B, c: C, d: D) => R
): LibraryFunction => ({
  parameterKinds: params.map((param) => param.kind),
  returnKind: returns.kind,
  call: (args, name = ANONYMOUS) => {
    checkArity(name, args, 4);
    return body(
      convertArgument(name, params[0], args, 0),
      convertArgument(name, params[1], args, 1),
      convertArgument(name, params[2], args, 2),
      convertArgument(name, params[3], args, 3)
    );
  },
});

export const function5 = <
  A extends YarnValue,
  B extends YarnValue,
  C extends YarnValue,
  D extends YarnValue,
  E extends YarnValue,
  R extends YarnValue,
>(
  params: readonly [ValueParam<A>, ValueParam<B>, ValueParam<C>, ValueParam<D>, ValueParam<E>],
  returns: ValueParam<R>,
  body: (a: A, b: B, c: C, d: D, e: E) => R
): LibraryFunction => ({
  parameterKinds: params.map((param) => param.kind),
  returnKind: returns.kind,
  call: (args, name = ANONYMOUS) => {
    checkArity(name, args, 5);
    return body(
      convertArgument(name, params[0], args, 0),
      convertArgument(name, params[1], args, 1),
      convertArgument(name, params[2], args, 2),
      convertArgument(name, params[3], args, 3),
      convertArgument(name, params[4], args, 4)
    );
  },
});

const VISITING_PREFIX = "$Yarn.Internal.Visiting.";

export class Library {
  private readonly functions = new Map<string, LibraryFunction>();

  static generateUniqueVisitedVariableForNode(nodeName: string): string {
    return `${VISITING_PREFIX}${nodeName}`;
  }

  register(name: string, fn: LibraryFunction): this {
    this.functions.set(name, fn);
    return this;
  }

  /** Copies every function of `other` into this library, replacing same-named entries. */
  importLibrary(other: Library): this {
    for (const [name, fn] of other.functions) {
      this.functions.set(name, fn);
    }
    return this;
  }

  get(name: string): LibraryFunction | undefined {
    return this.functions.get(name);
  }

  has(name: string): boolean {
    return this.functions.has(name);
  }

  names(): string[] {
    return Array.from(this.functions.keys()).sort();
  }

  call(name: string, args: readonly YarnValue[]): YarnValue {
    const fn = this.functions.get(name);
    if (!fn) {
      throw new SpindleError("LIBRARY_FUNCTION_NOT_FOUND", `Function "${name}" is not registered.`);
    }
    return fn.call(args, name);
  }

  declarations(): Declaration[] {
    return this.names().flatMap((name) => {
      const fn = this.functions.get(name);
      if (!fn) {
        return [];
      }
      const declaration: Declaration = {
        name,
        type: functionType(fn.parameterKinds.map(primitiveType), primitiveType(fn.returnKind)),
        description: `Library function ${name}`,
        provenance: "explicit",
        sourceFileName: null,
        span: null,
      };
      return [declaration];
    });
  }
}

export const visitCount = (storage: VariableStorage, nodeName: string): number => {
  const value = storage.get(Library.generateUniqueVisitedVariableForNode(nodeName));
  return typeof value === "number" ? value : 0;
};

export const isNodeVisited = (storage: VariableStorage, nodeName: string): boolean =>
  visitCount(storage, nodeName) > 0;

const registerOperators = (library: Library): void => {
  library
    .register("Number.Add", function2([numberParam, numberParam], numberParam, (a, b) => a + b))
    .register("Number.Minus", function2([numberParam, numberParam], numberParam, (a, b) => a - b))
    .register("Number.Multiply", function2([numberParam, numberParam], numberParam, (a, b) => a * b))
    .register("Number.Divide", function2([numberParam, numberParam], numberParam, (a, b) => a / b))
    .register("Number.Modulo", function2([numberParam, numberParam], numberParam, (a, b) => a % b))
    .register("Number.UnaryMinus", function1([numberParam], numberParam, (a) => -a))
    .register("Number.EqualTo", function2([numberParam, numberParam], booleanParam, (a, b) => a === b))
    .register("Number.NotEqualTo", function2([numberParam, numberParam], booleanParam, (a, b) => a !== b))
    .register("Number.GreaterThan", function2([numberParam, numberParam], booleanParam, (a, b) => a > b))
    .register(
      "Number.GreaterThanOrEqualTo",
      function2([numberParam, numberParam], booleanParam, (a, b) => a >= b)
    )
    .register("Number.LessThan", function2([numberParam, numberParam], booleanParam, (a, b) => a < b))
    .register(
      "Number.LessThanOrEqualTo",
      function2([numberParam, numberParam], booleanParam, (a, b) => a <= b)
    )
    .register("String.Add", function2([stringParam, stringParam], stringParam, (a, b) => a + b))
    .register("String.EqualTo", function2([stringParam, stringParam], booleanParam, (a, b) => a === b))
    .register("String.NotEqualTo", function2([stringParam, stringParam], booleanParam, (a, b) => a !== b))
    .register("Bool.EqualTo", function2([booleanParam, booleanParam], booleanParam, (a, b) => a === b))
    .register("Bool.NotEqualTo", function2([booleanParam, booleanParam], booleanParam, (a, b) => a !== b))
    .register("Bool.And", function2([booleanParam, booleanParam], booleanParam, (a, b) => a && b))
    .register("Bool.Or", function2([booleanParam, booleanParam], booleanParam, (a, b) => a || b))
    .register("Bool.Xor", function2([booleanParam, booleanParam], booleanParam, (a, b) => a !== b))
    .register("Bool.Not", function1([booleanParam], booleanParam, (a) => !a));
};

const registerBuiltins = (library: Library, random: RandomSource): void => {
  const randomRange = (min: number, max: number): number => {
    const low = Math.ceil(Math.min(min, max));
    const high = Math.floor(Math.max(min, max));
    return low + Math.floor(random.next() * (high - low + 1));
  };

  library
    .register("random", function0(numberParam, () => random.next()))
    .register("random_range", function2([numberParam, numberParam], numberParam, randomRange))
    .register("dice", function1([numberParam], numberParam, (sides) => randomRange(1, sides)))
    .register("round", function1([numberParam], numberParam, (value) => Math.round(value)))
    .register(
      "round_places",
      function2([numberParam, numberParam], numberParam, (value, places) => {
        const factor = 10 ** Math.trunc(places);
        return Math.round(value * factor) / factor;
      })
    )
    .register("floor", function1([numberParam], numberParam, (value) => Math.floor(value)))
    .register("ceil", function1([numberParam], numberParam, (value) => Math.ceil(value)))
    .register("inc", function1([numberParam], numberParam, (value) =>
      Number.isInteger(value) ? value + 1 : Math.ceil(value)
    ))
    .register("dec", function1([numberParam], numberParam, (value) =>
      Number.isInteger(value) ? value - 1 : Math.floor(value)
    ))
    .register("decimal", function1([numberParam], numberParam, (value) => value - Math.trunc(value)))
    .register("int", function1([numberParam], numberParam, (value) => Math.trunc(value)));
};

export interface StandardLibraryOptions {
  randomSeed?: number;
}

/**
 * Operators, numeric helpers and the visit-tracking functions. `visited`
 * and `visited_count` read `storage` directly, so they answer correctly
 * whether or not a virtual machine is running.
 */
export const createStandardLibrary = (
  storage: VariableStorage = new MemoryVariableStorage(),
  options: StandardLibraryOptions = {}
): Library => {
  const library = new Library();
  registerOperators(library);
  registerBuiltins(library, createRandomSource(options.randomSeed));
  library
    .register("visited", function1([stringParam], booleanParam, (node) => isNodeVisited(storage, node)))
    .register("visited_count", function1([stringParam], numberParam, (node) => visitCount(storage, node)));
  return library;
};
