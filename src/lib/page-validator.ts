/**
 * Page Validation Module
 *
 * Detects bot-challenge and rate-limit pages before their markup reaches the
 * table extractor, where they would otherwise surface as "no tables found".
 */

import { load } from 'cheerio';

/**
 * Page metadata for validation
 */
export interface PageMetadata {
    url: string;
    title?: string;
    bodyText?: string;
}

/**
 * Challenge detection result
 */
export interface ChallengeDetectionResult {
    isBlocked: boolean;
    reasons: string[];
}

/**
 * Pull the title and the start of the body text out of a document
 */
export function readPageMetadata(url: string, html: string): PageMetadata {
    const $ = load(html);
    return {
        url,
        title: $('title').first().text().trim(),
        bodyText: $('body').text().replace(/\s+/g, ' ').trim().substring(0, 1000),
    };
}

/**
 * Detect if a page is showing a Cloudflare challenge or the site's rate-limit notice
 */
export function detectChallengePage(metadata: PageMetadata): ChallengeDetectionResult {
    const reasons: string[] = [];

    if (metadata.title?.includes('Just a moment')) {
        reasons.push('Challenge title detected');
    }

    const titleLower = metadata.title?.toLowerCase() ?? '';
    if (titleLower.includes('429 error') || titleLower.includes('rate limited')) {
        reasons.push('Rate limit page detected');
    }

    if (metadata.bodyText) {
        const bodyLower = metadata.bodyText.toLowerCase();

        if (bodyLower.includes('verify you are human')) {
            reasons.push('Human verification text detected');
        }

        if (bodyLower.includes('checking your browser')) {
            reasons.push('Browser check text detected');
        }

        if (bodyLower.includes('turnstile') || bodyLower.includes('cf-turnstile')) {
            reasons.push('Turnstile script detected');
        }

        if (bodyLower.includes('cloudflare') && bodyLower.includes('ray id')) {
            reasons.push('Cloudflare Ray ID detected');
        }
    }

    return {
        isBlocked: reasons.length > 0,
        reasons,
    };
}
