// scripts/comparePriceLists.ts
// Uso: tsx api/scripts/comparePriceLists.ts <archivoA> <archivoB> [--out reporte.xlsx] [--sheet Hoja1]
import { parseCompareArgs, runCompare } from '../src/services/priceLists/cli';

async function main() {
  await runCompare(parseCompareArgs(process.argv.slice(2)));
}

main().catch((e) => {
  console.error('Fallo comparando las listas:', e instanceof Error ? e.message : e);
  process.exit(1);
});
