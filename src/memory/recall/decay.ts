/**
 * Time and trust decay for recall weighting.
 *
 * Both factors multiply the similarity score:
 *   weight = similarity × timeDecay(ts) × trustDecay(trust)
 */

export const MS_PER_DAY = 86_400_000

export const DEFAULT_TIME_GAMMA = 0.03
export const DEFAULT_TRUST_BETA = 0.4

/** Words compared when deciding whether two recalled texts are redundant */
export const REDUNDANCY_WINDOW = 4

/**
 * exp(-γ × age_days). Future timestamps give a factor above 1.
 */
export function timeDecay(ts: number, now: number, gamma: number = DEFAULT_TIME_GAMMA): number {
  const ageDays = (now - ts) / MS_PER_DAY
  return Math.exp(-gamma * ageDays)
}

/**
 * exp(β × (trust - 1)): 1.0 at full trust, lower for low-trust items.
 */
export function trustDecay(trust: number, beta: number = DEFAULT_TRUST_BETA): number {
  return Math.exp(beta * (trust - 1))
}

export function leadingWords(text: string, count: number = REDUNDANCY_WINDOW): Set<string> {
  const words = text.toLowerCase().split(/\s+/).filter((word) => word.length > 0)
  return new Set(words.slice(0, count))
}

/**
 * True when the leading words of `text` share any word with the leading
 * words of any text already picked.
 */
export function isRedundant(text: string, picked: string[]): boolean {
  const words = leadingWords(text)
  return picked.some((other) => {
    for (const word of leadingWords(other)) {
      if (words.has(word)) return true
    }
    return false
  })
}
