import type { PageSource } from '../../src/lib/league-iterator.js';

/** Serves canned pages by source id; an Error entry is thrown instead */
export class FakePageSource implements PageSource {
    readonly requested: string[] = [];

    constructor(private readonly pages: Record<string, string | Error>) {}

    async fetch(sourceId: string): Promise<string> {
        this.requested.push(sourceId);
        const page = this.pages[sourceId];
        if (page === undefined) throw new Error(`No page for ${sourceId}`);
        if (page instanceof Error) throw page;
        return page;
    }
}
