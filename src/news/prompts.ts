import type { EvaluationFormat, RubricKind } from "../config/types.pipeline.js";

export const MISSING_DESCRIPTION_EVALUATE = "[No description - evaluate based on headline]";
export const MISSING_DESCRIPTION_TRANSFORM = "[CREATE DESCRIPTION - Original missing/identical]";

export const EVALUATION_SYSTEM_PROMPT: Record<EvaluationFormat, string> = {
  json: "You are a crypto news evaluator. Focus on crypto and blockchain content. Respond with valid JSON.",
  text: "You are a crypto news evaluator. Focus on crypto and blockchain content. Start your answer with PASS or BLOCK.",
};

export const TRANSFORM_SYSTEM_PROMPT =
  "You are a crypto news processor. Extract ALL crypto tickers from names (Bitcoin→BTC). " +
  "Money formatting: under $1M use commas ($750,000), $1M and above use words ($1.5 million). " +
  "Commas are ONLY allowed in dollar amounts, nowhere else. Always respond with valid JSON.";

const INCLUSIVE_RUBRIC = `You are a crypto and blockchain news filter. Your job is to identify news about crypto, blockchain, DeFi and digital assets.

ALWAYS PASS news about:
- Crypto price moves of any size, market cap milestones, volume spikes, liquidations, whale transfers, exchange flows
- Bitcoin and Ethereum (any mention), major altcoins, significant memecoin moves, stablecoin developments
- DeFi protocols: DEX volumes, lending, staking, TVL changes, launches, governance votes, hacks and exploits
- NFTs, blockchain gaming and metaverse projects
- Network upgrades, hard forks, layer 2s, bridges, zero-knowledge and scaling work
- Mining: hash rate, difficulty, profitability, energy debates, mining bans
- Institutional adoption: treasury purchases, ETFs, custody, payments integrations
- Crypto regulation, SEC actions, tax policy, exchange licensing, CBDCs
- Exchange listings, outages, security incidents, withdrawal issues
- DAOs, decentralized identity, tokenized real-world assets

BLOCK news that is:
- General finance or stock market news without a crypto angle
- General technology without blockchain
- Macro or political news without crypto impact

When unsure, PASS.`;

const STRICT_RUBRIC = `You are a breaking crypto news gatekeeper. Only market-moving events get through.

PASS only when the news is one of:
- A move of 5% or more in BTC or ETH, or 15% or more in a top-20 asset, within a day
- A hack, exploit or insolvency involving $10 million or more
- A regulatory or enforcement action by a national regulator or government against a major exchange, issuer or asset
- A spot ETF approval, rejection or launch for a major asset
- A treasury purchase or sale of $100 million or more by a company or government
- A network halt, consensus failure or emergency upgrade on a top-20 chain
- A stablecoin losing its peg by more than 2%

BLOCK everything else, including opinion, price predictions, minor listings, partnerships, routine upgrades and sponsored content.

When unsure, BLOCK.`;

const JSON_RESPONSE_FORMAT = `Analyze this crypto news and respond with JSON:
{
    "decision": "PASS" or "BLOCK",
    "reason": "Brief explanation",
    "relevance_score": 0.0 to 1.0,
    "categories": ["DeFi", "Bitcoin", "Ethereum", "NFT", "Regulation", ...],
    "importance": "HIGH", "MEDIUM" or "LOW",
    "mentioned_cryptos": ["BTC", "ETH", ...],
    "mentioned_blockchains": ["Ethereum", "Solana", ...]
}`;

const TEXT_RESPONSE_FORMAT = `Answer on a single line that starts with PASS or BLOCK followed by a short reason.
Example: PASS Bitcoin moved 8% in a day`;

export function buildEvaluationPrompt(params: {
  rubric: RubricKind;
  format: EvaluationFormat;
  headline: string;
  description: string;
  source: string;
}): string {
  const rubric = params.rubric === "strict" ? STRICT_RUBRIC : INCLUSIVE_RUBRIC;
  const responseFormat = params.format === "json" ? JSON_RESPONSE_FORMAT : TEXT_RESPONSE_FORMAT;
  return `${rubric}

${responseFormat}

CRYPTO NEWS:
Headline: ${params.headline}
Description: ${params.description}
Source: ${params.source}
`;
}

export function buildTransformPrompt(params: {
  headline: string;
  description: string;
  source: string;
  link: string;
  placeholderTicker: string;
}): string {
  return `You turn crypto news into short breaking-news wire headlines. Analyze this article and create focused content.

ORIGINAL ARTICLE:
Headline: ${params.headline}
Description: ${params.description}
Source: ${params.source}
Link: ${params.link}

If the description is missing, identical to the headline or too brief, write a new crypto-focused description from the headline and include known metrics (price, percentage, volume).

STYLE RULES:
1. Start with the person, organization or coin name, then the action
2. NO commas or periods in the headline or description EXCEPT inside dollar amounts
3. Add the 🇺🇸 flag ONLY for US government officials
4. Money under $1 million uses exact amounts with commas: $750,000 (never $750k)
5. Money of $1 million and above uses words: $2.5 million, $1.3 billion
6. Tag every crypto asset with its $ ticker: $BTC $ETH $SOL
7. Include percentages for price moves and use urgent verbs: surges, dumps, crashes, bleeds

EXAMPLES:
- Bitcoin $BTC surges 8% to break $45,000 resistance as ETF approval nears
- Exchange sees $2.1 billion in withdrawals following CEO resignation
- Solo miner wins $373,000 Bitcoin $BTC block reward

TICKERS: extract up to 5 tickers for assets mentioned by name or symbol (Bitcoin → BTC, Ethereum → ETH, Solana → SOL, Ripple → XRP, Dogecoin → DOGE, Cardano → ADA, Tether → USDT, Polygon → MATIC, Chainlink → LINK, Uniswap → UNI). Never return an empty list and never return ["${params.placeholderTicker}"].

NUMBERS: if the article states a price, percentage change, volume or market cap, return the plain number (e.g. "$45.5K" → 45500, "surged 15%" → 15.0), otherwise null.

Respond with this JSON:
{
    "processed_headline": "headline, max 120 chars",
    "processed_description": "description, max 180 chars",
    "tickers": ["BTC", ...],
    "sentiment": "BULLISH" or "BEARISH" or "NEUTRAL",
    "market_impact": "market implications, max 200 chars",
    "price_mentioned": null or number,
    "price_change_percent": null or number,
    "volume_mentioned": null or number,
    "market_cap_mentioned": null or number
}
`;
}
