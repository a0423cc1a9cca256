/**
 * Normalization of catalog (Discogs) artist names into the form Last.fm
 * expects for scrobbles and lookups.
 */

export const VARIOUS_ARTISTS_CANONICAL = "Various Artists";

/**
 * Check if an artist name is a variation of "Various Artists"
 * and return the canonical form if so.
 *
 * Covers: VA, V.A., V/A, Various, Various Artist(s), <Various Artists>
 */
export function canonicalizeVariousArtists(name: string): string {
    const cleaned = name.trim().replace(/^<|>$/g, "");

    const vaPattern = /^v\.?\s*[/.]?\s*a\.?$/i;
    const variousPattern = /^various(\s+artists?)?$/i;

    if (vaPattern.test(cleaned) || variousPattern.test(cleaned)) {
        return VARIOUS_ARTISTS_CANONICAL;
    }

    return name;
}

/**
 * Discogs disambiguates homonymous artists with a numeric suffix
 * ("Nirvana (2)"); Last.fm knows them by the bare name.
 */
export function stripDiscogsDisambiguation(name: string): string {
    return name.replace(/\s*\(\d+\)\s*$/, "").trim();
}

/** Trailing "*" marks an artist name variation on Discogs. */
function stripNameVariationMarker(name: string): string {
    return name.replace(/\*+$/, "").trim();
}

export function cleanCatalogArtistName(name: string): string {
    const cleaned = stripDiscogsDisambiguation(
        stripNameVariationMarker(name.trim())
    );
    return canonicalizeVariousArtists(cleaned);
}
