import * as path from "path"
import { normalizePath } from "vite"
import { DirectoryConfigError, findConfigFile, parseDirectoryConfig } from "./config"
import { nodeFileSystem, type FileSystem } from "./fs"
import { blobUrl, treeUrl } from "./github"
import {
  DefaultPreamble,
  DefaultRepo,
  EndMarker,
  Langs,
  MarkdownExtension,
  NotAvailable,
  SeriesType,
  StartMarker,
  TableHeader,
  type ArticleRecord,
  type DirectoryConfig,
  type Lang,
  type RepoInfo,
} from "./shared"

export interface IndexOptions {
  fs?: FileSystem,
  // 链接中的路径相对于它
  cwd?: string,
  repo?: RepoInfo,
  // 按英文链接排序，false时保持发现顺序
  sort?: boolean,
}

// 数字开头的保留给排序用，.开头的是草稿
export function isExcluded(filename: string): boolean {
  return /^\d/.test(filename) || filename.startsWith(".")
}

function isMarkdown(filename: string): boolean {
  return path.extname(filename) == MarkdownExtension
}

// 表格单元里不能出现 |
function escapeCell(text: string): string {
  return text.replace(/\|/g, "\\|")
}

// 读取模板中 START 标记之前的内容
export function readPreamble(fs: FileSystem, templatePath: string): string {
  let stat = fs.stat(templatePath)
  if (stat == null || !stat.isFile) {
    return DefaultPreamble
  }

  let content = fs.readFile(templatePath)
  let startIndex = content.indexOf(StartMarker)
  let endIndex = content.indexOf(EndMarker)
  if (startIndex == -1 || endIndex == -1) {
    return DefaultPreamble
  }
  return content.substring(0, startIndex)
}

// 一次生成
// 每次生成都有自己的文章记录
export class IndexRun {
  // 文章名 -> 记录，按发现顺序
  records: Map<string, ArticleRecord> = new Map()

  fs: FileSystem
  cwd: string
  repo: RepoInfo
  sort: boolean

  constructor(options: IndexOptions = {}) {
    this.fs = options.fs ?? nodeFileSystem
    this.cwd = options.cwd ?? process.cwd()
    this.repo = options.repo ?? DefaultRepo
    this.sort = options.sort ?? true
  }

  relative(file: string): string {
    return normalizePath(path.relative(this.cwd, file))
  }

  setLink(articleName: string, lang: Lang, title: string, url: string) {
    let record = this.records.get(articleName)
    if (record == undefined) {
      record = { en: NotAvailable, zh: NotAvailable }
      this.records.set(articleName, record)
    }
    record[lang] = `[${escapeCell(title)}](${url})`
  }

  // 遍历目录
  traverse(dir: string) {
    let configFile = findConfigFile(this.fs, dir)
    if (configFile != undefined) {
      let source = this.fs.readFile(configFile)
      let config: DirectoryConfig | undefined
      try {
        config = parseDirectoryConfig(source, configFile)
      }
      catch (err) {
        if (!(err instanceof DirectoryConfigError)) {
          throw err
        }
        console.error(`invalid config in ${dir}: ${err.message}`)
      }

      if (config != undefined) {
        this.applyConfig(dir, config)
        return
      }
    }

    this.fs.readdir(dir).forEach(filename => {
      if (isExcluded(filename)) {
        return
      }
      let filepath = path.join(dir, filename)
      let stat = this.fs.stat(filepath)
      if (stat == null) {
        return
      }
      if (stat.isDirectory) {
        this.traverse(filepath)
      }
      else if (stat.isFile && isMarkdown(filename)) {
        this.addFile(filepath)
      }
    })
  }

  // 没有配置时，从路径推断文章名和语言
  addFile(filepath: string) {
    let relativePath = this.relative(filepath)
    let parts = relativePath.split("/")
    let title = path.basename(filepath, MarkdownExtension)

    let articleName = path.basename(path.dirname(filepath))
    let lang: Lang = "en"
    for (let i = 1; i < parts.length - 1; i++) {
      let part = parts[i]
      if (part == "en" || part == "zh") {
        articleName = parts[i - 1]
        lang = part
        break
      }
    }

    this.setLink(articleName, lang, title, blobUrl(relativePath, this.repo))
  }

  // 目录中排序后的第一个markdown文件
  findMarkdown(dir: string): string | undefined {
    let name = this.fs.readdir(dir)
      .filter(filename => !isExcluded(filename) && isMarkdown(filename))
      .sort()
      .find(filename => this.fs.stat(path.join(dir, filename))?.isFile)
    return name == undefined ? undefined : path.join(dir, name)
  }

  // 有标题的语言都指向url，没有任何标题时作为英文
  linkByTitles(articleName: string, config: DirectoryConfig, fallbackTitle: string, url: string) {
    let assigned = 0
    for (const lang of Langs) {
      let title = config.title?.[lang]
      if (title != undefined) {
        this.setLink(articleName, lang, title, url)
        assigned++
      }
    }
    if (assigned == 0) {
      this.setLink(articleName, "en", fallbackTitle, url)
    }
  }

  // 有配置的目录不再往下遍历
  applyConfig(dir: string, config: DirectoryConfig) {
    if (config.wip) {
      return
    }

    let articleName = path.basename(dir)

    if (config.type == SeriesType) {
      this.linkByTitles(articleName, config, articleName, treeUrl(this.relative(dir), this.repo))
      return
    }

    let langDirs = Langs.filter(lang => this.fs.stat(path.join(dir, lang))?.isDirectory)
    if (langDirs.length > 0) {
      langDirs.forEach(lang => {
        let file = this.findMarkdown(path.join(dir, lang))
        if (file == undefined) {
          return
        }
        let title = config.title?.[lang] ?? path.basename(file, MarkdownExtension)
        this.setLink(articleName, lang, title, blobUrl(this.relative(file), this.repo))
      })
      return
    }

    let file = this.findMarkdown(dir)
    if (file == undefined) {
      return
    }
    this.linkByTitles(articleName, config, path.basename(file, MarkdownExtension), blobUrl(this.relative(file), this.repo))
  }

  rows(): ArticleRecord[] {
    let rows = Array.from(this.records.values())
    if (this.sort) {
      // 直接比较整个单元格，包括链接语法
      rows.sort((a, b) => a.en < b.en ? -1 : a.en > b.en ? 1 : 0)
    }
    return rows
  }

  renderTable(): string {
    let table = "\n" + TableHeader
    this.rows().forEach(row => {
      table += `| ${row.en} | ${row.zh} |\n`
    })
    return table
  }
}

// 扫描docs生成README
export function generateIndex(docsRootPath: string, templatePath: string, outputPath: string, options: IndexOptions = {}) {
  let run = new IndexRun(options)
  let preamble = readPreamble(run.fs, templatePath)

  run.traverse(docsRootPath)

  run.fs.writeFile(outputPath, `${preamble}\n${run.renderTable()}`)
}
