export interface TrieConfig {
    wordFile?: string
    prefix: string
    printRoot: boolean
}

export type Env = { [key: string]: string | undefined }
