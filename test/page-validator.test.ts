/**
 * Tests for the page validator module
 */
import { describe, it, expect } from 'vitest';
import { detectChallengePage, readPageMetadata, type PageMetadata } from '../src/lib/page-validator.js';

describe('Page Validator', () => {
    describe('detectChallengePage', () => {
        it('should detect Cloudflare challenge title', () => {
            const metadata: PageMetadata = {
                url: 'https://fbref.test/en/comps/9/Premier-League-Stats',
                title: 'Just a moment...',
                bodyText: 'Please wait',
            };

            const result = detectChallengePage(metadata);
            expect(result.isBlocked).toBe(true);
            expect(result.reasons).toEqual(['Challenge title detected']);
        });

        it('should detect the rate limit page', () => {
            const result = detectChallengePage({
                url: 'https://fbref.test/en/comps/9/Premier-League-Stats',
                title: '429 Error - Rate Limited',
            });

            expect(result.isBlocked).toBe(true);
            expect(result.reasons).toEqual(['Rate limit page detected']);
        });

        it('should detect human verification text', () => {
            const result = detectChallengePage({
                url: 'https://fbref.test',
                title: 'Site',
                bodyText: 'Please verify you are human to continue',
            });

            expect(result.reasons).toContain('Human verification text detected');
        });

        it('should detect browser checking text', () => {
            const result = detectChallengePage({
                url: 'https://fbref.test',
                title: 'Please wait',
                bodyText: 'Checking your browser before accessing the site',
            });

            expect(result.reasons).toContain('Browser check text detected');
        });

        it('should detect Cloudflare Ray ID', () => {
            const result = detectChallengePage({
                url: 'https://fbref.test',
                title: 'Error',
                bodyText: 'Cloudflare Ray ID: abc123def456',
            });

            expect(result.reasons).toContain('Cloudflare Ray ID detected');
        });

        it('should not flag normal pages', () => {
            const result = detectChallengePage({
                url: 'https://fbref.test',
                title: '2024-2025 Premier League Stats',
                bodyText: 'League table, squad stats and top scorers',
            });

            expect(result.isBlocked).toBe(false);
            expect(result.reasons).toHaveLength(0);
        });

        it('should handle missing metadata', () => {
            expect(detectChallengePage({ url: 'https://fbref.test' }).isBlocked).toBe(false);
        });
    });

    describe('readPageMetadata', () => {
        it('should read the title and collapsed body text', () => {
            const html = '<html><head><title> Premier League Stats </title></head><body><h1>Table</h1>\n\n<p>Arsenal   top</p></body></html>';

            expect(readPageMetadata('https://fbref.test', html)).toEqual({
                url: 'https://fbref.test',
                title: 'Premier League Stats',
                bodyText: 'Table Arsenal top',
            });
        });
    });
});
