import { AmadeusClient } from './amadeus.js';
import { config } from './config.js';
import { openDatabase } from './db.js';
import { createTextGenerator } from './llm.js';
import { NarrativeSynthesizer } from './narrative.js';
import { createApp } from './routes.js';
import { SqliteStore } from './store.js';

const store = new SqliteStore(openDatabase(config.dbPath));
const textGenerator = createTextGenerator();
const amadeus = new AmadeusClient();

const app = createApp({
  store,
  synthesizer: textGenerator ? new NarrativeSynthesizer(textGenerator) : null,
  amadeus,
});

app.listen(config.port, () => {
  console.log(`RoutePulse API running on http://localhost:${config.port}`);
  console.log(`   Database: ${config.dbPath}`);
  console.log(`   Narrative insights: ${textGenerator ? config.narrative.model : 'disabled'}`);
  console.log(`   Offer ingestion: ${amadeus.configured ? 'Amadeus' : 'disabled'}`);
  console.log('   Endpoints:');
  console.log('     GET  /api/health');
  console.log('     POST /api/demand/aggregate');
  console.log('     GET  /api/demand');
  console.log('     POST /api/insights/generate');
  console.log('     GET  /api/insights');
  console.log('     GET  /api/analytics');
  console.log('     POST /api/ingest');
});
