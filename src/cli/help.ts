/**
 * @file help.ts
 * @module cli/help
 * @author modsearch contributors
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Help text for the query language and screen commands.
 */

import { LOADERS, SORT_RULES } from '../query/vocabulary.js';

/**
 * QUERY SYNTAX section.
 */
export const QUERY_SYNTAX_SECTION = `QUERY SYNTAX
    Write the search text normally. Add words starting with "+" to require an
    attribute and "-" to exclude it. Attributes are grouped into facets; a
    project must match ANY "+" attribute of each facet and NONE of the "-"
    attributes.

    Project type:   mod, resourcepack|rp, datapack|dp, modpack|mp, plugin, shader
    Loader:         ${LOADERS.join(', ')}
    Platform:       server|serverside, client|clientside,
                    serversupported, clientsupported
    Version:        v<game version>          e.g. +v1.20.1 (cannot be excluded)
    Tag:            t<tag>                   e.g. +tadventure, -tcursed

SORTING
    Add one word starting with "/" to sort in descending order.
    Rules: ${SORT_RULES.join(', ')} (default: relevance)

EXAMPLES
    +forge +mod +rp -dp -mp -quilt
        Forge mods or resource packs, not datapacks nor modpacks, not for Quilt.
    trajectory -serversupported +neoforge +mod +v1.21.1 /follows
        NeoForge mods for 1.21.1 without server support, sorted by follows.`;

/**
 * NAVIGATION section.
 */
export const NAVIGATION_SECTION = `NAVIGATION
    Results:        <N> open project N, < / > previous / next page,
                    p<N> go to page N, q back to search
    Releases:       <N> open release N, < / > / p<N> change page,
                    <version> and/or <loader> pick the most stable matching
                    release (e.g. "1.20.1 fabric", "v1.20.1", "forge"),
                    q back
    Release:        Enter download the primary file, "all" download every
                    file, d<N> open dependency N, q back
    Other screens:  h help`;

/**
 * Build the complete help text.
 */
export function buildHelpText(): string {
    return `${QUERY_SYNTAX_SECTION}\n\n${NAVIGATION_SECTION}`;
}
