import { BookingSite } from './site';
import { foreupSite } from './foreup.site';
import { recreationGovSite } from './recreation-gov.site';
import { reserveCaliforniaSite } from './reserve-california.site';

export const sites: BookingSite[] = [foreupSite, recreationGovSite, reserveCaliforniaSite];

export function getSite(name: string): BookingSite | undefined {
  return sites.find((site) => site.name === name);
}
