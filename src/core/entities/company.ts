export type CompanyIdentity = {
  cik: string;
  name: string;
  symbol: string;
  exchange?: string;
};
