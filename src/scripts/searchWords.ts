import * as dotenv from 'dotenv'
import consoleStamp from 'console-stamp'
import { inspect } from 'util'
import { Trie } from '../trie'
import { loadConfig } from '../config'
import { insertWordsFromFile } from '../wordFile'
consoleStamp(console)
dotenv.config()

const main = async () => {
    const config = loadConfig()
    if (config.wordFile == null) {
        throw new Error('TRIE_WORD_FILE must point at a word file.')
    }

    const trie = new Trie()
    const insertCount = await insertWordsFromFile(trie, config.wordFile)
    console.log(`Loaded ${insertCount} words [nodeCount=${trie.nodeCount}]`)

    for (const query of process.argv.slice(2)) {
        console.log(`${query}: contains=${trie.contains(query)} words=${inspect(trie.words(query))}`)
    }
}

main().catch((err: unknown) => {
    console.error(err)
    process.exitCode = 1
})
