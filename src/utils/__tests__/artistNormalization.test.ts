import {
    VARIOUS_ARTISTS_CANONICAL,
    canonicalizeVariousArtists,
    cleanCatalogArtistName,
    stripDiscogsDisambiguation,
} from "../artistNormalization";

describe("artistNormalization", () => {
    it.each(["VA", "V.A.", "V/A", "various", "Various Artist", "<Various Artists>"])(
        "canonicalizes %s",
        (name) => {
            expect(canonicalizeVariousArtists(name)).toBe(VARIOUS_ARTISTS_CANONICAL);
        }
    );

    it("leaves other names untouched", () => {
        expect(canonicalizeVariousArtists("Vangelis")).toBe("Vangelis");
    });

    it("strips the numeric disambiguation suffix", () => {
        expect(stripDiscogsDisambiguation("Nirvana (2)")).toBe("Nirvana");
        expect(stripDiscogsDisambiguation("Boards of Canada")).toBe("Boards of Canada");
    });

    it("keeps parentheses that are not a numeric suffix", () => {
        expect(stripDiscogsDisambiguation("Sunn O))) (Live)")).toBe("Sunn O))) (Live)");
    });

    it("cleans a catalog artist name for lookups", () => {
        expect(cleanCatalogArtistName("  Prince (3)* ")).toBe("Prince");
        expect(cleanCatalogArtistName("Various*")).toBe(VARIOUS_ARTISTS_CANONICAL);
    });
});
