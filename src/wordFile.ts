import { createReadStream } from 'fs'
import { createInterface } from 'readline'
import { once } from 'events'
import { Trie } from './trie'

const COMMENT_MARKER = '#'

const isCommentLine = (line: string): boolean => {
    const trimmed = line.trim()
    return trimmed === COMMENT_MARKER || trimmed.startsWith(`${COMMENT_MARKER} `)
}

/**
 * Streams a word file into the trie. Every whitespace separated token on a
 * line is inserted. A line whose first token is a lone '#' is a comment;
 * '#hashtag' is a word and goes in as 'hashtag'.
 *
 * @returns the number of tokens inserted
 */
export const insertWordsFromFile = async (trie: Trie, path: string): Promise<number> => {
    const readStream = createReadStream(path, { encoding: 'utf8' })
    // surfaces ENOENT and friends before readline takes the stream
    await once(readStream, 'open')

    const rl = createInterface({
        input: readStream,
        crlfDelay: Infinity
    })

    let insertCount = 0
    try {
        for await (const line of rl) {
            if (isCommentLine(line)) continue
            for (const word of line.split(/\s+/)) {
                if (word === '') continue
                trie.insert(word)
                insertCount += 1
            }
        }
    } finally {
        rl.close()
        readStream.close()
    }

    return insertCount
}
