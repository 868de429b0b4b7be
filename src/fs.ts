import * as fs from "fs"
import { globSync, hasMagic } from "glob"

export interface FileStat {
  isFile: boolean,
  isDirectory: boolean,
}

// 两个工具用到的全部文件操作，测试时换成内存实现
export interface FileSystem {
  readdir(dir: string): string[]
  // 不存在时返回null
  stat(file: string): FileStat | null
  readFile(file: string): string
  writeFile(file: string, content: string): void
}

export function createNodeFileSystem(): FileSystem {
  return {
    readdir: (dir) => fs.readdirSync(dir),
    stat: (file) => {
      if (!fs.existsSync(file)) {
        return null
      }
      let st = fs.statSync(file)
      return { isFile: st.isFile(), isDirectory: st.isDirectory() }
    },
    readFile: (file) => fs.readFileSync(file, "utf8"),
    writeFile: (file, content) => fs.writeFileSync(file, content, "utf8"),
  }
}

export const nodeFileSystem: FileSystem = createNodeFileSystem()

// 展开命令行参数中的glob，去重并保持参数顺序
export function expandPatterns(patterns: string[], cwd: string = process.cwd()): string[] {
  let files: string[] = []
  patterns.forEach(pattern => {
    let matched = hasMagic(pattern) ? globSync(pattern, { cwd, nodir: true }).sort() : [pattern]
    matched.forEach(file => {
      if (!files.includes(file)) {
        files.push(file)
      }
    })
  })
  return files
}
