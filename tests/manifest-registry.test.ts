import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { loadManifest } from "../src/manifest/loader.js";
import {
  createRegistrySource,
  filterLoadable,
  isLoadable,
  loadRegistry,
  resolveProjectFile,
} from "../src/registry/registry.js";
import { createAccessor } from "../src/resolver/accessor.js";
import { FileNotFoundError, ManifestParseError, UnknownPluginError } from "../src/utils/errors.js";
import { captureError, createWorkspace, writeSampleProject, type Workspace } from "./helpers/fixtures.js";

let ws: Workspace;

beforeEach(() => {
  ws = createWorkspace();
});

afterEach(() => {
  ws.cleanup();
});

describe("loadManifest", () => {
  it("loads a manifest and defaults require to an empty list", () => {
    const file = ws.writeJson("core.json", { name: "Core", binary: "core.so" });
    const manifest = loadManifest(file);

    expect(manifest).toEqual({ name: "Core", require: [], binary: "core.so", path: file });
  });

  it("fails with FileNotFoundError for a missing file", () => {
    const file = ws.file("missing.json");
    const err = captureError(() => loadManifest(file), FileNotFoundError);

    expect(err.exitCode).toBe(600);
    expect(err.message).toBe(`'${file}' not found.`);
  });

  it("fails with ManifestParseError for invalid JSON", () => {
    const file = ws.writeText("broken.json", "{ name: ");
    const err = captureError(() => loadManifest(file), ManifestParseError);

    expect(err.path).toBe(file);
    expect(err.exitCode).toBe(601);
  });

  it("fails with ManifestParseError when the path is a directory", () => {
    const dir = ws.file("plugins");
    fs.mkdirSync(dir, { recursive: true });
    const err = captureError(() => loadManifest(dir), ManifestParseError);

    expect(err.path).toBe(dir);
    expect(err.exitCode).toBe(601);
    expect(err.detail).toContain("EISDIR");
  });

  it("names the offending field of a schema violation", () => {
    const file = ws.writeJson("bad.json", { name: "Bad", require: "core" });
    const err = captureError(() => loadManifest(file), ManifestParseError);

    expect(err.detail).toBe("require: Expected array, received string");
  });

  it("rejects a manifest without a name", () => {
    const file = ws.writeJson("anon.json", { require: [] });
    const err = captureError(() => loadManifest(file), ManifestParseError);

    expect(err.detail).toBe("name: Required");
  });
});

describe("registry", () => {
  it("resolves project files relative to the registry", () => {
    const { registryFile } = writeSampleProject(ws);
    const registry = loadRegistry(registryFile);

    expect(registry.entries.size).toBe(4);
    expect(resolveProjectFile(registry, "math")).toBe(ws.file(path.join("plugins", "math", "math.ext.json")));
  });

  it("classifies libraries as not loadable", () => {
    const { registryFile } = writeSampleProject(ws);
    const registry = loadRegistry(registryFile);

    expect(isLoadable(registry, "core")).toBe(false);
    expect(isLoadable(registry, "physics")).toBe(true);
    expect(filterLoadable(registry, ["core", "audio", "math", "physics"])).toEqual(["audio", "math", "physics"]);
  });

  it("fails on unknown identifiers", () => {
    const { registryFile } = writeSampleProject(ws);
    const registry = loadRegistry(registryFile);

    expect(() => resolveProjectFile(registry, "network")).toThrow(UnknownPluginError);
    expect(() => isLoadable(registry, "network")).toThrow("Unknown plugin 'network'.");
  });

  it("rejects an unknown kind", () => {
    const file = ws.writeJson("registry.json", { plugins: { a: { project: "a.json", kind: "tool" } } });
    expect(() => loadRegistry(file)).toThrow(ManifestParseError);
  });

  it("treats a registry without plugins as empty", () => {
    const file = ws.writeJson("registry.json", {});
    expect(loadRegistry(file).entries.size).toBe(0);
  });

  it("fails with ManifestParseError for an entry naming a directory", () => {
    fs.mkdirSync(ws.file(path.join("plugins", "core")), { recursive: true });
    const registryFile = ws.writeJson("registry.json", { plugins: { core: "plugins/core" } });
    const accessor = createAccessor(createRegistrySource(loadRegistry(registryFile)));

    const err = captureError(() => accessor.fetch("core"), ManifestParseError);
    expect(err.path).toBe(ws.file(path.join("plugins", "core")));
  });

  it("feeds manifests to an accessor", () => {
    const { registryFile } = writeSampleProject(ws);
    const accessor = createAccessor(createRegistrySource(loadRegistry(registryFile)));

    const physics = accessor.fetch("physics");
    expect(physics.name).toBe("Physics");
    expect(physics.require).toEqual(["math", "core"]);
    expect(physics.path).toBe(ws.file(path.join("plugins", "physics", "physics.ext.json")));
  });
});
