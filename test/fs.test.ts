import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs"
import { tmpdir } from "os"
import * as path from "path"
import { createNodeFileSystem, expandPatterns } from "../src/fs"

let tmpDir: string

beforeEach(() => {
  tmpDir = mkdtempSync(path.join(tmpdir(), "blogs_fs_"))
  mkdirSync(path.join(tmpDir, "docs"))
  writeFileSync(path.join(tmpDir, "docs", "a.md"), "a")
  writeFileSync(path.join(tmpDir, "docs", "b.md"), "b")
  writeFileSync(path.join(tmpDir, "docs", "c.txt"), "c")
})

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true })
})

describe("expandPatterns", () => {
  it("expands globs and keeps literal paths", () => {
    expect(expandPatterns(["docs/*.md", "docs/a.md", "README.md"], tmpDir)).toEqual([
      "docs/a.md",
      "docs/b.md",
      "README.md",
    ])
  })
})

describe("createNodeFileSystem", () => {
  it("reads, writes and lists files", () => {
    let fs = createNodeFileSystem()
    let file = path.join(tmpDir, "docs", "d.md")

    fs.writeFile(file, "# 标题\n")

    expect(fs.readFile(file)).toBe("# 标题\n")
    expect(fs.stat(file)).toEqual({ isFile: true, isDirectory: false })
    expect(fs.stat(path.join(tmpDir, "docs"))).toEqual({ isFile: false, isDirectory: true })
    expect(fs.readdir(path.join(tmpDir, "docs")).sort()).toEqual(["a.md", "b.md", "c.txt", "d.md"])
  })

  it("returns null for missing paths", () => {
    expect(createNodeFileSystem().stat(path.join(tmpDir, "missing"))).toBeNull()
  })
})
