import * as dotenv from 'dotenv'
import consoleStamp from 'console-stamp'
import { inspect } from 'util'
import { Trie } from './trie'
import { loadConfig } from './config'
import { insertWordsFromFile } from './wordFile'
consoleStamp(console)
dotenv.config()

const SAMPLE_WORDS = ['apple', "ape'", 'ball']

const main = async () => {
    const config = loadConfig()
    const trie = new Trie()

    for (const word of SAMPLE_WORDS) trie.insert(word)

    if (config.wordFile != null) {
        const insertCount = await insertWordsFromFile(trie, config.wordFile)
        console.log(`Loaded ${insertCount} words from ${config.wordFile} [nodeCount=${trie.nodeCount}]`)
    }

    if (config.printRoot) console.log(trie.root.toString())

    const wordsWithPrefix = trie.words(config.prefix)
    console.log(`Words with prefix '${config.prefix}': ${inspect(wordsWithPrefix)}`)
}

main().catch((err: unknown) => {
    console.error(err)
    process.exitCode = 1
})
