import { expandPatterns } from "../src/fs"
import { rewriteImageLinks } from "../src/images"

// 用法: replace-image-url <file.md | glob> ...
const files = expandPatterns(process.argv.slice(2))

const count = rewriteImageLinks(files)

console.log(`${count} file(s) processed.`)
