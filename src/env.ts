import dotenv from "dotenv";

dotenv.config();

export const config = {
  PORT: process.env.PORT || "3000",
  GITHUB_APP_ID: process.env.GITHUB_APP_ID,
  GITHUB_WEBHOOK_SECRET: process.env.GITHUB_WEBHOOK_SECRET,
  GITHUB_PRIVATE_KEY: process.env.GITHUB_PRIVATE_KEY,
  // Bearer token for /api/tools; the tool API is not served without it
  TOOLS_API_TOKEN: process.env.TOOLS_API_TOKEN,
  // Any OpenAI-compatible chat completions endpoint
  REVIEW_AGENT_API_KEY: process.env.REVIEW_AGENT_API_KEY,
  REVIEW_AGENT_BASE_URL: process.env.REVIEW_AGENT_BASE_URL || "https://api.openai.com/v1",
  REVIEW_MODEL: process.env.REVIEW_MODEL || "gpt-4o-mini",
};
