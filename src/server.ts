import { createApp } from "./app";
import { loadServerEnv } from "./config/env";
import { createOpenAIRiskAssessor } from "./services/riskAssessor";

const ENV = loadServerEnv();

const app = createApp({
  assessor: createOpenAIRiskAssessor({
    apiKey: ENV.OPENAI_API_KEY,
    model: ENV.OPENAI_MODEL
  }),
  reportsDir: ENV.REPORTS_DIR,
  jwtSecret: ENV.JWT_SECRET,
  corsOrigin: ENV.CORS_ORIGIN
});

app.listen(ENV.PORT, () => {
  console.log(`UW quote server running on port ${ENV.PORT} (${ENV.NODE_ENV})`);
});
