/**
 * Worker bootstrap for sandboxed runs.
 *
 * Evaluated with `new Worker(WORKER_SOURCE, { eval: true })`, so it is plain
 * CommonJS JavaScript kept as a string. It builds a fresh vm context, runs
 * the code once and posts one reply.
 *
 * Nothing the code can see belongs to the worker's own realm. `console`,
 * `require`, `open` and `render` are compiled inside the context, and they
 * reach the worker only through primitive-in, JSON-out host operations.
 * Module objects cross as context-realm proxies. Host built-ins map onto the
 * context's own, so a `constructor` walk always ends at a Function that cannot
 * compile strings. Host objects stay read-only unless the sandboxed code
 * constructed them.
 *
 * workerData: { code, allowedModules, deniedModules, allowedPaths, outputDir, timeoutMs }
 * reply: { status: "ok", stdout, stderr, artifacts, files, result }
 *      | { status: "error", kind: "violation" | "runtime" | "timeout", name, message, stdout, stderr, artifacts, files }
 */

export const WORKER_SOURCE = String.raw`
"use strict";
const { parentPort, workerData } = require("node:worker_threads");
const vm = require("node:vm");
const fs = require("node:fs");
const path = require("node:path");
const util = require("node:util");

const { resolve: resolvePath, relative: relativePath, isAbsolute, dirname } = path;
const { readFileSync, writeFileSync, appendFileSync, mkdirSync } = fs;
const inspect = util.inspect;
const stringify = JSON.stringify;

const allowedModules = new Set(workerData.allowedModules);
const deniedModules = new Set(workerData.deniedModules);
const readableRoots = workerData.allowedPaths.map(function (p) { return resolvePath(p); });
const outputDir = workerData.outputDir ? resolvePath(workerData.outputDir) : null;

const stdout = [];
const stderr = [];
const artifacts = [];
const files = [];

// ============================================
// INTRINSICS
// ============================================

// Compiled once per realm; the two lists pair up by index.
function collectIntrinsics() {
  "use strict";
  const g = globalThis;
  const getProto = Object.getPrototypeOf;
  const list = [g];
  const constructors = [
    "Object", "Function", "Array", "Number", "Boolean", "String", "Symbol", "BigInt",
    "Date", "RegExp", "Promise", "Proxy", "Map", "Set", "WeakMap", "WeakSet", "WeakRef",
    "FinalizationRegistry", "ArrayBuffer", "SharedArrayBuffer", "DataView",
    "Int8Array", "Uint8Array", "Uint8ClampedArray", "Int16Array", "Uint16Array",
    "Int32Array", "Uint32Array", "Float32Array", "Float64Array", "BigInt64Array", "BigUint64Array",
    "Error", "EvalError", "RangeError", "ReferenceError", "SyntaxError", "TypeError",
    "URIError", "AggregateError"
  ];
  for (let i = 0; i < constructors.length; i++) {
    const ctor = g[constructors[i]];
    const usable = typeof ctor === "function";
    list.push(usable ? ctor : null);
    list.push(usable && ctor.prototype !== undefined ? ctor.prototype : null);
  }
  const singletons = [
    "JSON", "Math", "Reflect", "Atomics", "Intl", "WebAssembly",
    "eval", "isFinite", "isNaN", "parseFloat", "parseInt",
    "decodeURI", "decodeURIComponent", "encodeURI", "encodeURIComponent", "escape", "unescape"
  ];
  for (let i = 0; i < singletons.length; i++) {
    const value = g[singletons[i]];
    list.push(value === undefined ? null : value);
  }
  const asyncFunction = getProto(async function () {});
  const generatorFunction = getProto(function* () {});
  const asyncGeneratorFunction = getProto(async function* () {});
  const arrayIterator = getProto([][Symbol.iterator]());
  const typedArray = getProto(Int8Array);
  list.push(
    asyncFunction, asyncFunction.constructor,
    generatorFunction, generatorFunction.constructor, generatorFunction.prototype,
    asyncGeneratorFunction, asyncGeneratorFunction.constructor, asyncGeneratorFunction.prototype,
    getProto(asyncGeneratorFunction.prototype),
    arrayIterator, getProto(arrayIterator),
    getProto(""[Symbol.iterator]()),
    getProto(new Map()[Symbol.iterator]()),
    getProto(new Set()[Symbol.iterator]()),
    getProto(/x/[Symbol.matchAll]("")),
    typedArray, typedArray.prototype
  );
  return list;
}

// ============================================
// CONTEXT REALM
// ============================================

// Compiled inside the context from its source text, so every function it
// creates belongs to the context. It must not refer to anything outside its
// own body: free names resolve against the context's globals.
function createRealm(kit) {
  "use strict";
  const R = Reflect;
  const apply = R.apply;
  const construct = R.construct;
  const get = R.get;
  const set = R.set;
  const has = R.has;
  const ownKeys = R.ownKeys;
  const getOwnDesc = R.getOwnPropertyDescriptor;
  const defineProp = R.defineProperty;
  const deleteProp = R.deleteProperty;
  const getProto = R.getPrototypeOf;
  const setProto = R.setPrototypeOf;
  const isExtensible = R.isExtensible;
  const ProxyCtor = Proxy;
  const WeakMapCtor = WeakMap;
  const WeakSetCtor = WeakSet;
  const PromiseCtor = Promise;
  const ErrorCtor = Error;
  const mapGet = WeakMapCtor.prototype.get;
  const mapSet = WeakMapCtor.prototype.set;
  const setAdd = WeakSetCtor.prototype.add;
  const setHas = WeakSetCtor.prototype.has;
  const promiseResolve = PromiseCtor.resolve;
  const promiseThen = PromiseCtor.prototype.then;
  const startsWith = String.prototype.startsWith;
  const includes = String.prototype.includes;
  const bind = Function.prototype.bind;
  const hasOwn = Object.hasOwn;
  const freeze = Object.freeze;
  const isArray = Array.isArray;
  const isView = ArrayBuffer.isView;
  const parse = JSON.parse;
  const serialize = JSON.stringify;
  const toText = String;

  const ops = kit.ops;
  const checkModule = ops.checkModule;
  const loadModule = ops.loadModule;
  const openFile = ops.open;
  const readFile = ops.read;
  const writeFile = ops.write;
  const saveArtifact = ops.render;
  const print = ops.print;

  const inner = new WeakMapCtor();      // host value -> what the sandbox sees
  const outer = new WeakMapCtor();      // sandbox value -> what the host sees
  const innerProxies = new WeakSetCtor();
  const outerProxies = new WeakSetCtor();
  const constructed = new WeakSetCtor();
  const blocked = new WeakSetCtor();
  const violations = new WeakSetCtor();

  function mapLookup(map, key) { return apply(mapGet, map, [key]); }
  function mapStore(map, key, value) { apply(mapSet, map, [key, value]); }
  function setInsert(target, value) { apply(setAdd, target, [value]); }
  function setContains(target, value) { return apply(setHas, target, [value]); }

  function isObject(value) {
    return (typeof value === "object" && value !== null) || typeof value === "function";
  }

  function isIndex(key) {
    if (typeof key !== "string") return false;
    const n = +key;
    return n >>> 0 === n && toText(n) === key;
  }

  class SandboxViolation extends ErrorCtor {}
  defineProp(SandboxViolation.prototype, "name", { __proto__: null, value: "SandboxViolation", writable: true, configurable: true });

  function violation(message) {
    const err = new SandboxViolation(message);
    setInsert(violations, err);
    return err;
  }

  // ----- membrane -----

  function toInner(value) {
    if (!isObject(value)) return value;
    const known = mapLookup(inner, value);
    if (known !== undefined) return known;
    if (setContains(blocked, value)) {
      throw violation("Sandboxed code reached a host capability it may not use");
    }
    const proxy = wrap(value, toInner, toOuter, true);
    mapStore(inner, value, proxy);
    mapStore(outer, proxy, value);
    setInsert(innerProxies, proxy);
    return proxy;
  }

  function toOuter(value) {
    if (!isObject(value)) return value;
    const known = mapLookup(outer, value);
    if (known !== undefined) return known;
    const proxy = wrap(value, toOuter, toInner, false);
    mapStore(outer, value, proxy);
    mapStore(inner, proxy, value);
    setInsert(outerProxies, proxy);
    return proxy;
  }

  function reveal(value) {
    return isObject(value) && setContains(innerProxies, value) ? mapLookup(outer, value) : value;
  }

  function convertList(list, convert) {
    const result = [];
    const length = list.length;
    for (let i = 0; i < length; i++) {
      defineProp(result, i, { __proto__: null, value: convert(list[i]), writable: true, enumerable: true, configurable: true });
    }
    return result;
  }

  function copyDescriptor(desc, convert) {
    const copy = { __proto__: null };
    if (hasOwn(desc, "value")) copy.value = convert(desc.value);
    if (hasOwn(desc, "writable")) copy.writable = !!desc.writable;
    if (hasOwn(desc, "get")) copy.get = convert(desc.get);
    if (hasOwn(desc, "set")) copy.set = convert(desc.set);
    if (hasOwn(desc, "enumerable")) copy.enumerable = !!desc.enumerable;
    if (hasOwn(desc, "configurable")) copy.configurable = !!desc.configurable;
    return copy;
  }

  function shadowFor(real) {
    if (typeof real === "function") return apply(bind, function () {}, [null]);
    return isArray(real) ? [] : {};
  }

  // out: values leaving real toward the viewer; back: values from the viewer into real
  function wrap(real, out, back, fromHost) {
    let proxy;

    // Host objects take writes only when the sandbox built them, or on typed array elements
    function mayWrite(receiver, key) {
      if (!fromHost) return true;
      if (setContains(constructed, receiver) || setContains(outerProxies, receiver)) return true;
      return isView(receiver) && isIndex(key);
    }

    function receiverFor(receiver) {
      return receiver === proxy ? real : back(receiver);
    }

    const handler = {
      __proto__: null,
      get(target, key, receiver) {
        const self = receiverFor(receiver);
        let value;
        try { value = get(real, key, self); } catch (err) { throw out(err); }
        return out(value);
      },
      set(target, key, value, receiver) {
        const self = receiverFor(receiver);
        if (!mayWrite(self, key)) return false;
        const incoming = back(value);
        try { return set(real, key, incoming, self); } catch (err) { throw out(err); }
      },
      has(target, key) {
        try { return has(real, key); } catch (err) { throw out(err); }
      },
      deleteProperty(target, key) {
        if (!mayWrite(real, key)) return false;
        const shadow = getOwnDesc(target, key);
        if (shadow !== undefined && !shadow.configurable) return false;
        try { return deleteProp(real, key); } catch (err) { throw out(err); }
      },
      ownKeys(target) {
        try { return ownKeys(real); } catch (err) { throw out(err); }
      },
      getOwnPropertyDescriptor(target, key) {
        let desc;
        try { desc = getOwnDesc(real, key); } catch (err) { throw out(err); }
        if (desc === undefined) return undefined;
        const copy = copyDescriptor(desc, out);
        // Non-configurable properties must also exist on the shadow target
        if (!copy.configurable) defineProp(target, key, copy);
        return copy;
      },
      defineProperty(target, key, desc) {
        if (!mayWrite(real, key)) return false;
        const incoming = copyDescriptor(desc, back);
        let done;
        try { done = defineProp(real, key, incoming); } catch (err) { throw out(err); }
        if (done && hasOwn(incoming, "configurable") && !incoming.configurable) {
          const now = getOwnDesc(real, key);
          if (now !== undefined) defineProp(target, key, copyDescriptor(now, out));
        }
        return done;
      },
      getPrototypeOf(target) {
        let proto;
        try { proto = getProto(real); } catch (err) { throw out(err); }
        return out(proto);
      },
      setPrototypeOf(target, proto) {
        if (!mayWrite(real, "__proto__")) return false;
        const incoming = back(proto);
        try { return setProto(real, incoming); } catch (err) { throw out(err); }
      },
      isExtensible(target) {
        return isExtensible(target);
      },
      preventExtensions() {
        return false;
      },
      apply(target, thisArg, args) {
        const self = back(thisArg);
        const list = convertList(args, back);
        let result;
        try { result = apply(real, self, list); } catch (err) { throw out(err); }
        return out(result);
      },
      construct(target, args, newTarget) {
        const list = convertList(args, back);
        const derived = newTarget === proxy ? real : back(newTarget);
        let result;
        try { result = construct(real, list, derived); } catch (err) { throw out(err); }
        if (fromHost && isObject(result)) setInsert(constructed, result);
        return out(result);
      }
    };

    proxy = new ProxyCtor(shadowFor(real), handler);
    return proxy;
  }

  const hostIntrinsics = kit.hostIntrinsics;
  const ownIntrinsics = kit.intrinsics;
  for (let i = 0; i < ownIntrinsics.length; i++) {
    const host = hostIntrinsics[i];
    const own = ownIntrinsics[i];
    if (isObject(host) && isObject(own)) {
      mapStore(inner, host, own);
      mapStore(outer, own, host);
    }
  }
  const hostBlocked = kit.blocked;
  for (let i = 0; i < hostBlocked.length; i++) {
    setInsert(blocked, hostBlocked[i]);
  }

  // ----- host operations -----

  function callHost(op, a, b) {
    let raw;
    try { raw = op(a, b); } catch (err) { throw toInner(err); }
    const reply = parse(raw);
    if (reply.ok) return reply.value;
    if (reply.violation) throw violation(reply.message);
    const err = new ErrorCtor(reply.message);
    defineProp(err, "name", { __proto__: null, value: reply.name, writable: true, configurable: true });
    throw err;
  }

  function printer(stream) {
    return function () {
      const values = convertList(arguments, reveal);
      callHost(print, stream, values);
    };
  }

  function sandboxRequire(name) {
    if (typeof name !== "string") {
      throw violation("require() expects a module name string");
    }
    callHost(checkModule, name);
    let mod;
    try { mod = loadModule(name); } catch (err) { throw toInner(err); }
    return toInner(mod);
  }

  function open(file, mode) {
    if (typeof file !== "string") {
      throw violation("open() expects a path string");
    }
    const openMode = mode === undefined ? "r" : toText(mode);
    const target = callHost(openFile, file, openMode);
    if (openMode === "r") {
      return freeze({
        path: target,
        read(encoding) { return callHost(readFile, target, encoding === undefined ? "utf8" : toText(encoding)); },
        close() {}
      });
    }
    return freeze({
      path: target,
      write(text) { callHost(writeFile, target, toText(text)); },
      close() {}
    });
  }

  function render(svg) {
    callHost(saveArtifact, toText(svg));
  }

  // ----- outcome -----

  function safeGet(value, key) {
    try { return get(value, key); } catch (err) { return undefined; }
  }

  function describe(err) {
    let name = "Error";
    let message;
    if (isObject(err)) {
      if (setContains(violations, err)) {
        return serialize({ kind: "violation", name: "SandboxViolation", message: toText(safeGet(err, "message")) });
      }
      if (safeGet(err, "code") === "ERR_SCRIPT_EXECUTION_TIMEOUT") {
        return serialize({ kind: "timeout", name: "Error", message: "Script execution timed out" });
      }
      const rawName = safeGet(err, "name");
      const rawMessage = safeGet(err, "message");
      if (rawName !== undefined) name = toText(rawName);
      message = toText(rawMessage === undefined ? err : rawMessage);
    } else {
      message = toText(err);
    }
    const codeGeneration = (name === "EvalError" && apply(startsWith, message, ["Code generation from strings disallowed"]))
      || (name === "CompileError" && apply(includes, message, ["disallowed by embedder"]));
    if (codeGeneration) {
      return serialize({ kind: "violation", name: "SandboxViolation", message: "Code generation from strings is not allowed in sandboxed code" });
    }
    return serialize({ kind: "runtime", name, message });
  }

  function settle(value, done) {
    let pending;
    try {
      pending = apply(promiseResolve, PromiseCtor, [value]);
    } catch (err) {
      done("error", describe(err));
      return;
    }
    apply(promiseThen, pending, [
      function (result) { done("ok", reveal(result)); },
      function (err) { done("error", describe(err)); }
    ]);
  }

  // ----- globals -----

  function expose(name, value) {
    defineProp(globalThis, name, { __proto__: null, value, writable: true, enumerable: false, configurable: true });
  }

  expose("console", freeze({
    log: printer("stdout"),
    info: printer("stdout"),
    debug: printer("stdout"),
    warn: printer("stderr"),
    error: printer("stderr")
  }));
  expose("require", sandboxRequire);
  expose("open", open);
  expose("render", render);
  if (typeof kit.outputDir === "string") {
    expose("OUTPUT_DIR", kit.outputDir);
  }
  defineProp(ErrorCtor, "prepareStackTrace", { __proto__: null, value: undefined, writable: false, enumerable: false, configurable: false });

  return freeze({ describe, settle });
}

// ============================================
// HOST OPERATIONS
// ============================================

function moduleRoot(name) {
  const bare = name.startsWith("node:") ? name.slice(5) : name;
  return bare.split("/")[0];
}

function isWithin(target, root) {
  const rel = relativePath(root, target);
  return rel === "" || (!rel.startsWith("..") && !isAbsolute(rel));
}

function isReadable(target) {
  return readableRoots.some(function (root) { return isWithin(target, root); });
}

function isWritable(target) {
  return outputDir !== null && target !== outputDir && isWithin(target, outputDir);
}

function ok(value) {
  return stringify({ ok: true, value: value === undefined ? null : value });
}

function refuse(message) {
  return stringify({ ok: false, violation: true, message: message });
}

// Host operations take primitives and answer with JSON text, never objects
function operation(fn) {
  return function (a, b) {
    try {
      return fn(a, b);
    } catch (err) {
      const name = err !== null && typeof err === "object" && typeof err.name === "string" ? err.name : "Error";
      const message = err !== null && typeof err === "object" && typeof err.message === "string" ? err.message : String(err);
      return stringify({ ok: false, violation: false, name: name, message: message });
    }
  };
}

function format(value) {
  return typeof value === "string" ? value : inspect(value, { depth: 4, customInspect: false });
}

const ops = {
  checkModule: operation(function (name) {
    const root = moduleRoot(String(name));
    if (deniedModules.has(root)) {
      return refuse("Import of '" + name + "' is not allowed for security reasons");
    }
    if (!allowedModules.has(root)) {
      return refuse("Import of '" + name + "' is not available in the sandbox");
    }
    return ok(null);
  }),

  // Only reached after checkModule accepted the name
  loadModule: function (name) {
    const bare = String(name);
    return require(bare.startsWith("node:") ? bare : "node:" + bare);
  },

  open: operation(function (file, mode) {
    if (mode === "r") {
      const target = resolvePath(file);
      if (!isReadable(target)) {
        return refuse("Reading '" + file + "' is not allowed. Only files provided with the request can be read");
      }
      return ok(target);
    }
    if (mode === "w" || mode === "a") {
      if (outputDir === null) {
        return refuse("Writing files is not available: no output directory was provided");
      }
      const target = resolvePath(outputDir, file);
      if (!isWritable(target)) {
        return refuse("Writing '" + file + "' is not allowed. Files can only be written under OUTPUT_DIR");
      }
      mkdirSync(dirname(target), { recursive: true });
      if (mode === "w") {
        writeFileSync(target, "");
      }
      if (files.indexOf(target) === -1) {
        files.push(target);
      }
      return ok(target);
    }
    return refuse("Unsupported open() mode '" + mode + "'. Use 'r', 'w' or 'a'");
  }),

  read: operation(function (target, encoding) {
    if (!isReadable(target)) {
      return refuse("Reading '" + target + "' is not allowed. Only files provided with the request can be read");
    }
    return ok(readFileSync(target, String(encoding)));
  }),

  write: operation(function (target, text) {
    if (!isWritable(target)) {
      return refuse("Writing '" + target + "' is not allowed. Files can only be written under OUTPUT_DIR");
    }
    appendFileSync(target, String(text));
    return ok(null);
  }),

  render: operation(function (svg) {
    artifacts.push(String(svg));
    return ok(null);
  }),

  // values is a context array; read by index only
  print: operation(function (stream, values) {
    const parts = [];
    const count = values.length;
    for (let i = 0; i < count; i++) {
      parts.push(format(values[i]));
    }
    (stream === "stderr" ? stderr : stdout).push(parts.join(" "));
    return ok(null);
  })
};

// ============================================
// RUN
// ============================================

const context = vm.createContext(Object.create(null), {
  name: "sandbox",
  codeGeneration: { strings: false, wasm: false }
});

const realm = vm.runInContext("(" + createRealm.toString() + ")", context)({
  hostIntrinsics: collectIntrinsics(),
  intrinsics: vm.runInContext("(" + collectIntrinsics.toString() + ")()", context),
  blocked: [process, require, fs, vm, parentPort, workerData],
  outputDir: outputDir,
  ops: ops
});
const describe = realm.describe;
const settle = realm.settle;

function reply(message) {
  message.stdout = stdout;
  message.stderr = stderr;
  message.artifacts = artifacts;
  message.files = files;
  parentPort.postMessage(message);
}

function fail(description) {
  const info = JSON.parse(description);
  reply({ status: "error", kind: info.kind, name: info.name, message: info.message });
}

function run() {
  let value;
  try {
    const script = new vm.Script(workerData.code, { filename: "sandbox.js" });
    value = script.runInContext(context, { timeout: workerData.timeoutMs, displayErrors: false });
  } catch (err) {
    fail(describe(err));
    return;
  }

  let settled = false;
  settle(value, function (status, payload) {
    if (settled) return;
    settled = true;
    if (status === "ok") {
      reply({ status: "ok", result: payload === undefined ? null : inspect(payload, { depth: 4, customInspect: false }) });
    } else {
      fail(payload);
    }
  });
}

run();
`;
