export type KnownCacheOptions = {
  /** First id each cache assigns. Default: 1 */
  idBase?: number
}
