export const config = {
  anthropicApiKey: process.env.ANTHROPIC_API_KEY || "",
  aiModel: process.env.AI_MODEL || "claude-haiku-4-5-20251001",
  enableAiEnhancement: process.env.ENABLE_AI_ENHANCEMENT !== "false",
  dbPath: process.env.DB_PATH || "data/label-history.db",
  cataloguePath: process.env.CATALOGUE_PATH || "catalogues/legal-metrology-v1.json",
  trendWindow: parseInt(process.env.TREND_WINDOW || "5", 10),
  trendEpsilon: parseFloat(process.env.TREND_EPSILON || "0.02"),
};
