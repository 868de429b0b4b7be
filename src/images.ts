import * as path from "path"
import { normalizePath } from "vite"
import { nodeFileSystem, type FileSystem } from "./fs"
import { rawUrl } from "./github"
import { DefaultRepo, type RepoInfo } from "./shared"

export interface RewriteOptions {
  fs?: FileSystem,
  cwd?: string,
  repo?: RepoInfo,
}

// 代码块和行内代码，没有闭合的代码块一直到文件末尾
export const CodeSpanPattern = /(```[\s\S]*?(?:```|$)|`[\s\S]*?`)/

// ![alt](path "title")，![alt](<path> 'title')，alt里可以有一层方括号
const MarkdownImagePattern = /(!\[(?:[^\[\]]|\[[^\]]*\])*\]\(\s*)(?:<([^>\n]*)>|([^)\s<](?:[^)\n]*?[^)\s])?))((?:\s+(?:"[^"]*"|'[^']*'|\([^)]*\)))?\s*\))/g

// <img ... src="path" ...>
const HtmlImagePattern = /(<img\s(?:[^>]*?\s)?src=")(?!http)([^"]+)("[^>]*>)/g

// 偶数下标是正文，奇数下标是代码
export function splitByCodeSpans(content: string): string[] {
  return content.split(CodeSpanPattern)
}

// 已经编码过的路径先解码，避免编码两次
function decodeRef(ref: string): string {
  try {
    return decodeURI(ref)
  }
  catch {
    return ref
  }
}

// 图片路径 -> github上的图片地址
// /开头的路径相对于仓库根目录
export function resolveImageUrl(filePath: string, encodedRef: string, cwd: string, repo: RepoInfo): string {
  let ref = decodeRef(encodedRef)
  let imgAbsPath = ref.startsWith("/")
    ? path.join(cwd, ref)
    : path.resolve(cwd, path.dirname(filePath), ref)
  return rawUrl(normalizePath(path.relative(cwd, imgAbsPath)), repo)
}

export function rewriteContent(content: string, filePath: string, options: RewriteOptions = {}): string {
  let cwd = options.cwd ?? process.cwd()
  let repo = options.repo ?? DefaultRepo
  let toUrl = (ref: string) => resolveImageUrl(filePath, ref, cwd, repo)

  return splitByCodeSpans(content)
    .map((section, index) => {
      if (index % 2 == 1) {
        return section
      }
      return section
        .replace(MarkdownImagePattern, (match, prefix: string, angled: string | undefined, bare: string | undefined, suffix: string) => {
          let ref = angled ?? bare ?? ""
          if (ref == "" || ref.startsWith("http")) {
            return match
          }
          return angled === undefined ? `${prefix}${toUrl(ref)}${suffix}` : `${prefix}<${toUrl(ref)}>${suffix}`
        })
        .replace(HtmlImagePattern, (_match, prefix: string, ref: string, suffix: string) => {
          return `${prefix}${toUrl(ref)}${suffix}`
        })
    })
    .join("")
}

// 原地改写每个文件，返回处理的文件数
export function rewriteImageLinks(filePaths: string[], options: RewriteOptions = {}): number {
  let fs = options.fs ?? nodeFileSystem
  filePaths.forEach(filePath => {
    let content = fs.readFile(filePath)
    fs.writeFile(filePath, rewriteContent(content, filePath, options))
  })
  return filePaths.length
}
