import * as path from "path"
import * as yaml from "js-yaml"
import type { FileSystem } from "./fs"
import { Langs, type DirectoryConfig } from "./shared"

// 按顺序查找，先找到的生效
export const ConfigFileNames = ["config.json", "config.yaml", "config.yml"] as const

export class DirectoryConfigError extends Error {
  constructor(readonly file: string, message: string) {
    super(message)
    this.name = "DirectoryConfigError"
  }
}

export function findConfigFile(fs: FileSystem, dir: string): string | undefined {
  for (const name of ConfigFileNames) {
    let candidate = path.join(dir, name)
    if (fs.stat(candidate)?.isFile) {
      return candidate
    }
  }
  return undefined
}

function parseSource(source: string, file: string): unknown {
  try {
    if (path.extname(file) == ".json") {
      return source.trim() == "" ? null : JSON.parse(source)
    }
    return yaml.load(source)
  }
  catch (err) {
    throw new DirectoryConfigError(file, "failed to parse: " + (err instanceof Error ? err.message : String(err)))
  }
}

function isPlainObject(value: unknown): value is object {
  return value !== null && typeof value == "object" && !Array.isArray(value)
}

// 解析并检查配置文件，未知的键会被忽略
export function parseDirectoryConfig(source: string, file: string): DirectoryConfig {
  let raw = parseSource(source, file)

  // 空文件
  if (raw === null || raw === undefined) {
    return {}
  }
  if (!isPlainObject(raw)) {
    throw new DirectoryConfigError(file, "the config must be an object")
  }

  let fields = new Map<string, unknown>(Object.entries(raw))
  let errors: string[] = []
  let config: DirectoryConfig = {}

  let wip = fields.get("wip")
  if (wip !== undefined) {
    if (typeof wip == "boolean") {
      config.wip = wip
    }
    else {
      errors.push(`"wip" must be a boolean`)
    }
  }

  let type = fields.get("type")
  if (type !== undefined) {
    if (typeof type == "string") {
      config.type = type
    }
    else {
      errors.push(`"type" must be a string`)
    }
  }

  let title = fields.get("title")
  if (title !== undefined) {
    if (isPlainObject(title)) {
      let titles = new Map<string, unknown>(Object.entries(title))
      let parsed: { en?: string, zh?: string } = {}
      Langs.forEach(lang => {
        let value = titles.get(lang)
        if (value === undefined) {
          return
        }
        if (typeof value == "string") {
          parsed[lang] = value
        }
        else {
          errors.push(`"title.${lang}" must be a string`)
        }
      })
      config.title = parsed
    }
    else {
      errors.push(`"title" must be an object`)
    }
  }

  if (errors.length > 0) {
    throw new DirectoryConfigError(file, errors.join("; "))
  }
  return config
}
