import { TrieNode } from './trieNode'
import { letterAt, letterIndices, normalizeKey } from './letterUtils'

/**
 * Prefix tree over lowercase ASCII letters. Keys are lowercased on the way in;
 * insert and words drop non-letters while contains rejects any key that has one.
 */
export class Trie {
    public readonly root: TrieNode = new TrieNode()
    private _nodeCount: number = 1

    get nodeCount(): number {
        return this._nodeCount
    }

    insert(word: string): void {
        let current: TrieNode = this.root
        for (const index of letterIndices(word)) {
            if (index == null) continue

            let next = current.children[index]
            if (next == null) {
                next = new TrieNode()
                current.children[index] = next
                this._nodeCount += 1
            }
            current = next
        }
        current.isEndOfWord = true
    }

    contains(word: string): boolean {
        let current: TrieNode = this.root
        for (const index of letterIndices(word)) {
            if (index == null) return false

            const next = current.children[index]
            if (next == null) return false
            current = next
        }
        return current.isEndOfWord
    }

    words(prefix: string): string[] {
        let current: TrieNode = this.root
        for (const index of letterIndices(prefix)) {
            if (index == null) continue

            const next = current.children[index]
            if (next == null) return []
            current = next
        }

        const wordList: string[] = []
        this._collectWords(current, normalizeKey(prefix), wordList)
        return wordList
    }

    // depth-first with an explicit stack; children go on z..a so they come off a..z
    private _collectWords(start: TrieNode, startPrefix: string, wordList: string[]): void {
        const stack: Array<[TrieNode, string]> = [[start, startPrefix]]
        let entry = stack.pop()
        while (entry != null) {
            const [node, prefix] = entry
            if (node.isEndOfWord) wordList.push(prefix)

            for (let index = node.children.length - 1; index >= 0; index--) {
                const child = node.children[index]
                if (child != null) stack.push([child, prefix + letterAt(index)])
            }
            entry = stack.pop()
        }
    }
}
