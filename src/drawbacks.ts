import { tryEnhance, type DrawbackInput, type TextEnhancer } from './enhancer.js';

/** Known weaknesses of tracked vendors, keyed by feed source name. */
export const VENDOR_WEAKNESSES: Record<string, string> = {
    'Databricks': 'Platform complexity and DBU-based pricing can be hard to forecast.',
    'Snowflake': 'Consumption-based costs can escalate quickly without strict governance.',
    'Microsoft': 'Tight coupling to the Azure and Microsoft 365 ecosystem limits flexibility.',
    'Sigma Computing': 'Depends on the underlying cloud warehouse for performance and cost.',
    'Salesforce': 'Licensing is expensive and analytics features are fragmented across products.',
    'Qlik': 'Proprietary scripting and associative engine raise the learning curve.',
    'Looker': 'LookML modeling requires dedicated developer effort to maintain.',
    'Google': 'Product roadmap shifts can leave customers facing forced migrations.',
    'OpenAI': 'Model behavior changes between versions can break downstream workflows.',
    'Anthropic': 'Smaller enterprise ecosystem and fewer native integrations than larger clouds.',
    'Tableau': 'High per-seat licensing and heavy desktop authoring workflow.',
};

const KEYWORD_RULES: Array<{ keys: string[]; text: string }> = [
    { keys: ['security', 'breach', 'privacy'], text: 'May raise security and compliance concerns.' },
    { keys: ['ai', 'machine learning', 'automation'], text: 'Could require significant compute resources and expert oversight.' },
    { keys: ['cloud', 'saas'], text: 'Relies on external infrastructure and possible vendor lock-in.' },
    { keys: ['partnership', 'integration'], text: 'Integration complexity and potential data silos.' },
    { keys: ['cost', 'pricing'], text: 'Pricing changes may raise the total cost of ownership.' },
    { keys: ['complexity', 'training'], text: 'Steep learning curve may require additional training.' },
    { keys: ['migration', 'silo'], text: 'Migration effort and risk of fragmented data.' },
    { keys: ['performance', 'latency'], text: 'Performance at scale may need careful tuning.' },
];

export const GENERIC_DRAWBACK = 'Consider cost, adoption effort, and governance implications.';

const vendorIndex = new Map(Object.entries(VENDOR_WEAKNESSES).map(([name, text]) => [name.toLowerCase(), text]));

export function vendorWeakness(source?: string): string | undefined {
    if (!source) return undefined;
    return vendorIndex.get(source.trim().toLowerCase());
}

/** First keyword group hit on the lower-cased title and summary; substring match. */
export function keywordDrawback(title: string, summary?: string): string | undefined {
    const text = `${title} ${summary || ''}`.toLowerCase();
    return KEYWORD_RULES.find((r) => r.keys.some((k) => text.includes(k)))?.text;
}

/**
 * Rule-based drawback: vendor table, then keyword groups, then the generic sentence.
 */
export function suggestDrawback(title: string, summary?: string, source?: string): string {
    const hint = keywordDrawback(title, summary);
    const vendor = vendorWeakness(source);
    if (vendor) return hint ? `${vendor} ${hint}` : vendor;
    return hint ?? GENERIC_DRAWBACK;
}

export async function annotateDrawback(input: DrawbackInput, enhancer?: TextEnhancer): Promise<string> {
    if (enhancer) {
        const generated = await tryEnhance(() => enhancer.drawback(input));
        if (generated) return generated;
    }
    return suggestDrawback(input.title, input.summary, input.source);
}
