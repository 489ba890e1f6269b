import { writeFile } from 'node:fs/promises';
import { ConnectorError, JSONRPCError, connect } from 'node-odoo-rpc';

// ANSI color codes for better console output
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  green: '\x1b[32m',
  blue: '\x1b[34m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
};

function log(message: string, color: keyof typeof colors = 'reset') {
  console.log(`${colors[color]}${message}${colors.reset}`);
}

function logSection(title: string) {
  console.log(`\n${colors.bright}${colors.cyan}${'='.repeat(60)}${colors.reset}`);
  console.log(`${colors.bright}${colors.cyan}  ${title}${colors.reset}`);
  console.log(`${colors.bright}${colors.cyan}${'='.repeat(60)}${colors.reset}\n`);
}

async function main() {
  const protocol = process.env.ODOO_PROTOCOL ?? 'jsonrpc';
  const host = process.env.ODOO_HOST ?? 'localhost';
  const port = process.env.ODOO_PORT ?? 8069;
  const db = process.env.ODOO_DB ?? 'demo';
  const login = process.env.ODOO_LOGIN ?? 'admin';
  const password = process.env.ODOO_PASSWORD ?? 'admin';

  log('Session Client Example', 'bright');
  log(`Connecting to ${host}:${port} (${protocol})...`, 'blue');

  const connector = await connect(protocol, { host, port, timeout: 30, debug: true });
  log(`✓ Server version: ${connector.version ?? 'unknown'}`, 'green');

  // ========================================
  // Demo 1: Session
  // ========================================
  logSection('Demo 1: Authenticate');

  try {
    const session = await connector.proxyJSON
      .segment('web')
      .segment('session')
      .segment('authenticate')
      .invoke({ db, login, password });
    log(`✓ Logged in (request id ${session.id})`, 'green');
  } catch (error) {
    if (error instanceof JSONRPCError && error.remoteName === 'odoo.exceptions.AccessDenied') {
      log('✗ Wrong login or password', 'red');
      process.exit(1);
    }
    throw error;
  }

  // ========================================
  // Demo 2: Read records
  // ========================================
  logSection('Demo 2: Read Partners');

  const partners = await connector.proxyJSON.call('/web/dataset/call_kw', {
    model: 'res.partner',
    method: 'search_read',
    args: [[]],
    kwargs: { fields: ['name', 'email'], limit: 5 },
  });
  log(`Response: ${JSON.stringify(partners.result, null, 2)}`, 'green');

  // ========================================
  // Demo 3: Plain HTTP with the same session
  // ========================================
  logSection('Demo 3: Download a Report');

  const report = await connector.proxyHTTP.get('/report/pdf/base.report_irmodulereference/1');
  if (report.status === 200) {
    await writeFile('report.pdf', report.body);
    log(`✓ Saved report.pdf (${report.body.length} bytes)`, 'green');
  } else {
    log(`✗ Report download answered HTTP ${report.status}`, 'yellow');
  }

  log('\n✓ All demos completed successfully!', 'bright');
}

// Run main
main().catch((error: unknown) => {
  if (error instanceof ConnectorError) {
    log(`Fatal error (${error.name}): ${error.message}`, 'red');
  } else {
    log(`Fatal error: ${String(error)}`, 'red');
  }
  process.exit(1);
});
