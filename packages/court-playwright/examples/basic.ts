/**
 * Basic usage of court-playwright
 *
 * Searches one case and asks for the CAPTCHA code on the terminal.
 *
 *   npm run example -w court-playwright -- "W.P.(C)" 1234 2023
 */

import { createInterface } from 'readline/promises';
import { writeFileSync } from 'fs';
import { MemorySearchStore, createHighCourtSearch } from '../src/index.js';

async function main() {
  const [caseType = 'W.P.(C)', caseNumber = '1234', year = String(new Date().getFullYear())] = process.argv.slice(2);

  const store = new MemorySearchStore();
  const { orchestrator, exchange } = createHighCourtSearch({
    store,
    session: { headless: true },
    search: { challengeWaitMs: 180000 },
  });

  const rl = createInterface({ input: process.stdin, output: process.stdout });

  // ============================================
  // CAPTCHA on the terminal
  // ============================================
  exchange.on('challenge:pending', (challenge) => {
    const prompt = async () => {
      if (challenge.artifact.kind === 'text') {
        console.log(`CAPTCHA: ${challenge.artifact.text}`);
      } else {
        writeFileSync('captcha.png', Buffer.from(challenge.artifact.imageBase64, 'base64'));
        console.log('CAPTCHA image saved to captcha.png');
      }
      const code = await rl.question('Code: ');
      exchange.supply(challenge.attemptId, code, challenge.challengeId);
    };
    prompt().catch((error: unknown) => console.error('Prompt failed:', error));
  });

  orchestrator.on('search:state', ({ state }) => console.log(`-> ${state}`));

  const result = await orchestrator.search({ caseType, caseNumber, year: Number(year) });
  rl.close();

  if (!result.success) {
    console.error(`Search failed (${result.failure.kind}): ${result.failure.message}`);
    process.exitCode = 1;
    return;
  }

  const { record } = result;
  console.log('Title:', record.title);
  console.log('Petitioner:', record.petitioner);
  console.log('Respondent:', record.respondent);
  console.log('Next hearing:', record.nextHearingDate ?? 'unknown');
  for (const order of record.orders) {
    console.log(`  ${order.date ?? '----------'}  ${order.description}  ${order.pdfUrl ?? ''}`);
  }

  const history = await store.listHistory();
  console.log(`Attempts logged: ${history.total}`);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
