/**
 * Query parameters shared by single and batch lookups
 */
export interface IpApiQuery {
  /** OR of the requested field bits, control fields included */
  fields: number;
  /** Omitted for English, which is the API default */
  lang?: string;
}
