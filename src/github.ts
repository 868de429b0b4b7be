import { normalizePath } from "vite"
import { DefaultRepo, type RepoInfo } from "./shared"

// 把path编码为url，保留分隔符
export function pathEncodeUrl(pathTo: string): string {
  let u: string[] = []
  normalizePath(pathTo).split("/").forEach(item => {
    u.push(encodeURIComponent(item))
  })
  return u.join("/")
}

function repoUrl(view: "blob" | "tree", relativePath: string, repo: RepoInfo): string {
  return `https://github.com/${repo.username}/${repo.repo}/${view}/${repo.branch}/${pathEncodeUrl(relativePath)}`
}

// 文件页面
export function blobUrl(relativePath: string, repo: RepoInfo = DefaultRepo): string {
  return repoUrl("blob", relativePath, repo)
}

// 目录页面，系列文章用
export function treeUrl(relativePath: string, repo: RepoInfo = DefaultRepo): string {
  return repoUrl("tree", relativePath, repo)
}

// 图片原始文件
export function rawUrl(relativePath: string, repo: RepoInfo = DefaultRepo): string {
  return blobUrl(relativePath, repo) + "?raw=true"
}
