import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { listFilesByExtension, loadKnowledgeDocuments, ProjectFiles } from "../../src/services/projectFiles";

const tempRoots: string[] = [];

const makeRoot = async (): Promise<string> => {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "repair-files-"));
  tempRoots.push(root);
  return root;
};

const writeFile = async (root: string, relativePath: string, content: string): Promise<void> => {
  const absolutePath = path.join(root, relativePath);
  await fs.mkdir(path.dirname(absolutePath), { recursive: true });
  await fs.writeFile(absolutePath, content, "utf8");
};

const options = (projectRoot: string) => ({
  projectRoot,
  buildDescriptor: "pom.xml",
  targetSubdir: "src/main/java",
  sourceExtension: ".java"
});

afterEach(async () => {
  await Promise.all(tempRoots.splice(0).map((root) => fs.rm(root, { recursive: true, force: true })));
});

describe("listFilesByExtension", () => {
  it("walks directories in sorted order and skips build output", async () => {
    const root = await makeRoot();
    await writeFile(root, "b/B.java", "class B {}");
    await writeFile(root, "a/A.java", "class A {}");
    await writeFile(root, "a/notes.txt", "ignored");
    await writeFile(root, "target/Generated.java", "class Generated {}");

    expect(await listFilesByExtension(root, ".java")).toEqual([path.join(root, "a/A.java"), path.join(root, "b/B.java")]);
  });

  it("returns an empty list for a missing root", async () => {
    const root = await makeRoot();
    expect(await listFilesByExtension(path.join(root, "missing"), ".java")).toEqual([]);
  });
});

describe("ProjectFiles", () => {
  it("puts the build descriptor first, followed by the sources", async () => {
    const root = await makeRoot();
    await writeFile(root, "pom.xml", "<project/>");
    await writeFile(root, "src/main/java/com/example/Foo.java", "class Foo {}");
    await writeFile(root, "src/test/java/com/example/FooTest.java", "class FooTest {}");

    const fileSet = await new ProjectFiles(options(root)).collect();

    expect(fileSet).toEqual({
      root,
      descriptor: path.join(root, "pom.xml"),
      files: [path.join(root, "pom.xml"), path.join(root, "src/main/java/com/example/Foo.java")],
      warnings: []
    });
  });

  it("warns and falls back to the descriptor when there are no sources", async () => {
    const root = await makeRoot();
    await writeFile(root, "pom.xml", "<project/>");

    const fileSet = await new ProjectFiles(options(root)).collect();

    expect(fileSet.files).toEqual([path.join(root, "pom.xml")]);
    expect(fileSet.warnings).toEqual([`No .java files found in ${path.join(root, "src/main/java")}. Including pom.xml only.`]);
  });

  it("omits a missing descriptor", async () => {
    const root = await makeRoot();
    await writeFile(root, "src/main/java/Foo.java", "class Foo {}");

    const fileSet = await new ProjectFiles(options(root)).collect();

    expect(fileSet.descriptor).toBeUndefined();
    expect(fileSet.files).toEqual([path.join(root, "src/main/java/Foo.java")]);
  });
});

describe("loadKnowledgeDocuments", () => {
  it("reads every markdown file under the directory", async () => {
    const root = await makeRoot();
    await writeFile(root, "maven.md", "# Maven\nUse dependencyManagement");
    await writeFile(root, "nested/junit.md", "# JUnit");
    await writeFile(root, "nested/readme.txt", "skip");

    expect(await loadKnowledgeDocuments(root)).toEqual([
      { source: path.join(root, "maven.md"), content: "# Maven\nUse dependencyManagement" },
      { source: path.join(root, "nested/junit.md"), content: "# JUnit" }
    ]);
  });
});
