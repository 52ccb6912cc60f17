import { Env, TrieConfig } from './types'

export const DEFAULT_PREFIX = 'ap'

export const loadConfig = (env: Readonly<Env> = process.env): TrieConfig => {
    const wordFile = env.TRIE_WORD_FILE
    return {
        wordFile: wordFile == null || wordFile === '' ? undefined : wordFile,
        prefix: env.TRIE_PREFIX ?? DEFAULT_PREFIX,
        printRoot: env.TRIE_PRINT_ROOT?.toLowerCase() !== 'false'
    }
}
