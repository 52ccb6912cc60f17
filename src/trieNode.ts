import { inspect } from 'util'
import { ALPHABET_SIZE, letterAt } from './letterUtils'

export class TrieNode {
    public readonly children: Array<TrieNode | undefined>
    public isEndOfWord: boolean = false

    constructor() {
        this.children = new Array<TrieNode | undefined>(ALPHABET_SIZE).fill(undefined)
    }

    /**
     * Shallow summary of this node: the letters that have a child and the
     * end-of-word flag. Descendants are not visited.
     */
    toString(): string {
        const present: string[] = []
        this.children.forEach((child, index) => {
            if (child != null) present.push(`${letterAt(index)}: TrieNode`)
        })
        const entries = present.length > 0 ? `{ ${present.join(', ')} }` : '{}'
        return `${entries}, isEndOfWord: ${this.isEndOfWord}`
    }

    [inspect.custom](): string {
        return this.toString()
    }
}
