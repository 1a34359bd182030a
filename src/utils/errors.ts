/**
 * Raised for inputs that can never produce a split: bad proportions,
 * an empty corpus, or a fold layout that does not fit the corpus.
 */
export class ParameterError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ParameterError'
  }
}
