import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { Manifest } from "../../src/manifest/schema.js";
import type { ManifestAccessor, PluginId } from "../../src/resolver/types.js";
import { UnknownPluginError } from "../../src/utils/errors.js";

/** In-memory accessor over a dependency graph. Records every fetch. */
export function fakeAccessor(graph: Record<PluginId, PluginId[]>): ManifestAccessor & { calls: PluginId[] } {
  const calls: PluginId[] = [];
  return {
    calls,
    fetch(id: PluginId): Manifest {
      calls.push(id);
      const require = graph[id];
      if (require === undefined) throw new UnknownPluginError(id);
      return { name: id, require, path: `/plugins/${id}/${id}.json` };
    },
  };
}

/** Every identifier appears once, after all of its dependencies. */
export function isValidOrder(closure: ReadonlyMap<PluginId, readonly PluginId[]>, order: readonly PluginId[]): boolean {
  if (order.length !== closure.size || new Set(order).size !== order.length) return false;
  const position = new Map(order.map((id, index) => [id, index]));
  for (const [id, deps] of closure) {
    const at = position.get(id);
    if (at === undefined) return false;
    for (const dep of deps) {
      const depAt = position.get(dep);
      if (depAt === undefined || depAt >= at) return false;
    }
  }
  return true;
}

/** Scratch directory under the OS temp dir. */
export interface Workspace {
  root: string;
  file(relative: string): string;
  writeJson(relative: string, value: unknown): string;
  writeText(relative: string, text: string): string;
  cleanup(): void;
}

export function createWorkspace(): Workspace {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "extreq-test-"));
  const file = (relative: string) => path.join(root, relative);
  const writeText = (relative: string, text: string) => {
    const target = file(relative);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, text, "utf-8");
    return target;
  };
  return {
    root,
    file,
    writeText,
    writeJson: (relative, value) => writeText(relative, JSON.stringify(value, null, 2)),
    cleanup: () => fs.rmSync(root, { recursive: true, force: true }),
  };
}

/**
 * A project requiring `physics` and `audio`, both built on the `core`
 * library; `physics` also needs `math`.
 */
export function writeSampleProject(ws: Workspace): { projectFile: string; registryFile: string } {
  ws.writeJson("plugins/core/core.ext.json", { name: "Core", binary: "bin/core.so" });
  ws.writeJson("plugins/math/math.ext.json", {
    name: "Math",
    require: ["core"],
    binary: { "linux-x64": { Release: "bin/release/libmath.so", Debug: "bin/debug/libmath.so" } },
  });
  ws.writeJson("plugins/physics/physics.ext.json", {
    name: "Physics",
    require: ["math", "core"],
    assets: "Assets",
    binary: { "linux-x64": "bin/libphysics.so" },
  });
  ws.writeJson("plugins/audio/audio.ext.json", {
    name: "Audio",
    require: ["core"],
    binary: "bin/audio.so",
  });
  const registryFile = ws.writeJson("registry.json", {
    plugins: {
      core: { project: "plugins/core/core.ext.json", kind: "library" },
      math: "plugins/math/math.ext.json",
      physics: { project: "plugins/physics/physics.ext.json" },
      audio: "plugins/audio/audio.ext.json",
    },
  });
  const projectFile = ws.writeJson("game/game.json", { name: "Game", require: ["physics", "audio"] });
  return { projectFile, registryFile };
}

/** Run `fn` and return the error it throws, which must be an instance of `type`. */
export function captureError<E extends Error>(fn: () => unknown, type: new (...args: never[]) => E): E {
  try {
    fn();
  } catch (err) {
    if (err instanceof type) return err;
    throw err;
  }
  throw new Error(`expected ${type.name} to be thrown`);
}
