// 仓库信息，生成的链接都指向这里
export interface RepoInfo {
    username: string,
    repo: string,
    branch: string,
}

export const DefaultRepo: RepoInfo = {
    username: "arichy",
    repo: "blogs",
    branch: "main",
}

// 文章语言
export type Lang = "en" | "zh"

export const Langs: readonly Lang[] = ["en", "zh"]

// 某种语言缺失时的单元格
export const NotAvailable = "N/A"

// 表示README表格中的一行
export interface ArticleRecord {
    // N/A 或者 [title](url)
    en: string,
    zh: string,
}

// 目录下的配置文件
export interface DirectoryConfig {
    // 还在写，不出现在索引里
    wip?: boolean,
    // "series" 表示整个目录是一个系列
    type?: string,
    title?: {
        en?: string,
        zh?: string,
    }
}

export const SeriesType = "series"

// README模板中的标记
export const StartMarker = "<!-- START -->"
export const EndMarker = "<!-- END -->"

// 没有模板时使用
export const DefaultPreamble = "# My blogs\n\n<!-- START -->\ngenerated table\n<!-- END -->\n"

export const TableHeader = "| Link | 链接 |\n| ---- | ---- |\n"

export const MarkdownExtension = ".md"
