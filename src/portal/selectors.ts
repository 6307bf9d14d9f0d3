import type { PortalSelectors } from '../types.js';

export const DEFAULT_SELECTORS: PortalSelectors = {
  overlay: '.loading-overlay, .overlay-loading, .spinner-overlay, ngx-spinner .overlay',
  searchInput: 'input[formcontrolname="codiceFiscale"], input[name="codiceFiscale"], input[placeholder*="fiscale" i]',
  searchButton: 'Cerca',
  enterRecordButton: 'Accedi',
  sectionTab: 'Referti',
  typeHeaderLabel: 'Tipologia',
  confirmButton: 'Accetta',
  identityProviderPatterns: [
    /idpc/i,
    /\/idp\//i,
    /spid/i,
    /\bsso\b/i,
    /saml/i,
    /oauth/i,
    /\/login\b/i,
  ],
};

/** Elements that can start a download inside an action cell. The first one in document order is clicked. */
export const CLICKABLE_IN_CELL = 'a, button, [role="button"], img, i, [class*="icon"]';

/** Deep link that opens the portal on one patient. */
export function patientDeepLink(portalUrl: string, identifier: string): string {
  const base = portalUrl.replace(/#.*$/, '').replace(/\/?$/, '/');
  return `${base}#/?codiceFiscale=${encodeURIComponent(identifier.trim().toUpperCase())}`;
}
