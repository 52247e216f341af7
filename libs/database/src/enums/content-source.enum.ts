/** Who produced a contract content version. */
export enum ContentSource {
  AI = 'AI',
  USER = 'USER',
}
