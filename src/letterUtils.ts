export const ALPHABET_SIZE = 26

const CHAR_CODE_A = 'a'.charCodeAt(0)

/**
 * Slot index of a single character, or undefined when the character is not
 * a lowercase ASCII letter. Callers lowercase their input first.
 */
export const letterIndex = (char: string): number | undefined => {
    if (char.length !== 1) return undefined
    const index = char.charCodeAt(0) - CHAR_CODE_A
    return index >= 0 && index < ALPHABET_SIZE ? index : undefined
}

export const letterAt = (index: number): string => {
    return String.fromCharCode(CHAR_CODE_A + index)
}

/**
 * Lowercases the input and yields one entry per code point: the letter's slot
 * index, or undefined for anything that is not an ASCII letter.
 */
export function* letterIndices(s: string): Generator<number | undefined> {
    for (const char of s.toLowerCase()) {
        yield letterIndex(char)
    }
}

// letter-only, lowercased form of a key, as insert and words see it
export const normalizeKey = (s: string): string => {
    let key = ''
    for (const index of letterIndices(s)) {
        if (index != null) key += letterAt(index)
    }
    return key
}
