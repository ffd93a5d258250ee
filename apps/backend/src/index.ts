import 'dotenv/config';
import { createApp } from './app.js';
import { getGovernanceConfig } from './config/governance.js';
import { createChainEngine } from './services/chain/createChainEngine.js';

const PORT = process.env.PORT || 4000;

const config = getGovernanceConfig();
const app = createApp(createChainEngine(config));

// ─── Start ──────────────────────────────────────────────
app.listen(PORT, () => {
  console.log(`Governance backend running on http://localhost:${PORT} (chain ${config.chainId})`);
  console.log(`   Health:  http://localhost:${PORT}/health`);
  console.log(`   API:     http://localhost:${PORT}/api/governance`);
});

export default app;
