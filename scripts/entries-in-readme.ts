import * as path from "path"
import { fileURLToPath } from "url"
import { parseArgs } from "util"
import { generateIndex } from "../src/entries"

// 仓库根目录
const root = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..")

const { values } = parseArgs({
  args: process.argv.slice(2),
  options: {
    // 保持发现顺序
    unsorted: { type: "boolean", default: false },
  },
  strict: true,
})

generateIndex(
  path.join(root, "docs"),
  path.join(root, "README_TEMPLATE.md"),
  path.join(root, "README.md"),
  { sort: !values.unsorted },
)

console.log("README.md updated.")
