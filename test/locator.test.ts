import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { IoError } from "../src/core/errors.js";
import { locateRepositories } from "../src/locator/locator.js";
import { makeTmpRoot, writeTree } from "./helpers/fixtures.js";

const MANIFESTS = { dependency: "Cargo.toml", lock: "Cargo.lock", package: "package-manifest.toml" };

describe("locateRepositories", () => {
  let root: string;

  beforeEach(() => {
    root = makeTmpRoot();
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("lists each subdirectory with the manifests it has", () => {
    writeTree(root, {
      "omicron/Cargo.toml": "[package]\nname = \"omicron\"\n",
      "omicron/Cargo.lock": "version = 3\n",
      "omicron/package-manifest.toml": "",
      "propolis/Cargo.toml": "[package]\nname = \"propolis\"\n",
      "propolis/package-manifest.toml": "",
      "notes/README.md": "",
      "stray.txt": "",
    });

    const layouts = locateRepositories({ root, consumer: "omicron", manifests: MANIFESTS });

    expect(layouts).toEqual([
      { name: "notes", path: path.join(root, "notes"), dependencyManifests: [] },
      {
        name: "omicron",
        path: path.join(root, "omicron"),
        dependencyManifests: [path.join(root, "omicron/Cargo.toml")],
        lockFile: path.join(root, "omicron/Cargo.lock"),
        packageManifest: path.join(root, "omicron/package-manifest.toml"),
      },
      {
        name: "propolis",
        path: path.join(root, "propolis"),
        dependencyManifests: [path.join(root, "propolis/Cargo.toml")],
      },
    ]);
  });

  it("follows workspace members, globs and excludes", () => {
    writeTree(root, {
      "omicron/Cargo.toml": [
        "[workspace]",
        'members = ["sled-agent", "clients/*", "missing"]',
        'exclude = ["clients/legacy"]',
      ].join("\n"),
      "omicron/sled-agent/Cargo.toml": "[package]\nname = \"omicron-sled-agent\"\n",
      "omicron/clients/b-client/Cargo.toml": "[package]\nname = \"b-client\"\n",
      "omicron/clients/a-client/Cargo.toml": "[package]\nname = \"a-client\"\n",
      "omicron/clients/legacy/Cargo.toml": "[package]\nname = \"legacy\"\n",
      "omicron/clients/empty/.keep": "",
    });

    const [layout] = locateRepositories({ root, consumer: "omicron", manifests: MANIFESTS });

    expect(layout.dependencyManifests).toEqual([
      path.join(root, "omicron/Cargo.toml"),
      path.join(root, "omicron/clients/a-client/Cargo.toml"),
      path.join(root, "omicron/clients/b-client/Cargo.toml"),
      path.join(root, "omicron/sled-agent/Cargo.toml"),
    ]);
  });

  it("fails when the root is not a directory", () => {
    const file = path.join(root, "file");
    fs.writeFileSync(file, "");
    expect(() => locateRepositories({ root: file, consumer: "omicron", manifests: MANIFESTS })).toThrow(IoError);
  });

  it("fails when a required repository is missing", () => {
    writeTree(root, { "omicron/Cargo.toml": "" });
    try {
      locateRepositories({ root, consumer: "omicron", manifests: MANIFESTS, requiredRepositories: ["omicron", "crucible"] });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(IoError);
      if (e instanceof IoError) {
        expect(e.code).toBe("REPOSITORY_MISSING");
        expect(e.message).toBe(`Cannot find your local checkout of crucible in ${root}`);
      }
    }
  });

  it("reports an unparsable manifest as an I/O error", () => {
    writeTree(root, { "omicron/Cargo.toml": "[workspace\nmembers = " });
    expect(() => locateRepositories({ root, consumer: "omicron", manifests: MANIFESTS })).toThrow(/Cannot parse/);
  });
});
