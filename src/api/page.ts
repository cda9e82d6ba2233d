// src/api/page.ts - Single-page checker UI served at GET /
// The inline script only talks to /api/check and /api/recent-phishy.

export function getCheckerHtml(): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>Phishy Token Checker</title>
<style>
  * { margin: 0; padding: 0; box-sizing: border-box; }
  body {
    font-family: 'Segoe UI', system-ui, -apple-system, sans-serif;
    background: #0a0e17;
    color: #e1e4e8;
    padding: 20px;
    min-height: 100vh;
  }
  .container { max-width: 960px; margin: 0 auto; }
  h1 { font-size: 1.5rem; font-weight: 600; color: #58a6ff; margin-bottom: 4px; }
  .subtitle { color: #6e7681; font-size: 0.85rem; margin-bottom: 24px; }
  .card {
    background: #161b22;
    border: 1px solid #21262d;
    border-radius: 8px;
    padding: 16px;
    margin-bottom: 16px;
  }
  .card h3 {
    font-size: 0.75rem;
    text-transform: uppercase;
    letter-spacing: 0.5px;
    color: #8b949e;
    margin-bottom: 10px;
  }
  form { display: grid; gap: 10px; }
  input {
    background: #0d1117;
    border: 1px solid #30363d;
    border-radius: 6px;
    color: #e1e4e8;
    padding: 10px 12px;
    font-family: monospace;
    font-size: 0.9rem;
  }
  button {
    background: #238636;
    border: none;
    border-radius: 6px;
    color: #fff;
    font-weight: 600;
    padding: 10px;
    cursor: pointer;
  }
  button:disabled { background: #30363d; cursor: wait; }
  button.cancel { background: #da3633; }
  .actions { display: grid; gap: 10px; grid-template-columns: 1fr auto; }
  tr.recheck { cursor: pointer; }
  tr.recheck:hover td { background: #1c2128; }
  .grid { display: grid; gap: 12px; grid-template-columns: repeat(auto-fit, minmax(160px, 1fr)); }
  .value { font-size: 1.4rem; font-weight: 600; }
  .green { color: #3fb950; }
  .red { color: #f85149; }
  .yellow { color: #d29922; }
  .blue { color: #58a6ff; }
  .muted { color: #6e7681; font-size: 0.8rem; }
  .banner { padding: 12px 16px; border-radius: 8px; margin-bottom: 16px; font-weight: 600; }
  .banner.phishy { background: #3a1a1a; border: 1px solid #da3633; color: #f85149; }
  .banner.safe { background: #1a3a2a; border: 1px solid #238636; color: #3fb950; }
  .banner.info { background: #2a2a1a; border: 1px solid #9e6a03; color: #d29922; }
  .banner.error { background: #3a1a1a; border: 1px solid #da3633; color: #f85149; }
  table { width: 100%; border-collapse: collapse; font-size: 0.8rem; }
  th, td { text-align: left; padding: 6px 8px; border-bottom: 1px solid #21262d; }
  th { color: #8b949e; font-weight: 500; }
  td.mono { font-family: monospace; }
  .tag { font-size: 0.7rem; padding: 1px 6px; border-radius: 10px; background: #1f2937; color: #a5d6ff; margin-left: 4px; }
  .hidden { display: none; }
  a { color: #58a6ff; text-decoration: none; }
</style>
</head>
<body>
<div class="container">
  <h1>Phishy Token Checker</h1>
  <div class="subtitle">Finds wallets that received a token before (or without) buying it. Four.Meme (BSC) and Pump.fun (Solana).</div>

  <div class="card">
    <form id="checkForm">
      <input id="tokenAddress" placeholder="Token address (0x... or Solana mint)" autocomplete="off" required>
      <input id="bondingCurve" placeholder="Bonding curve (optional, Pump.fun only)" autocomplete="off">
      <div class="actions">
        <button id="checkButton" type="submit">Check token</button>
        <button id="cancelButton" type="button" class="cancel hidden">Cancel</button>
      </div>
    </form>
  </div>

  <div id="result"></div>

  <div class="card">
    <h3>Recently flagged tokens</h3>
    <div id="recent" class="muted">Loading...</div>
  </div>
</div>

<script>
let currentTokenType = 'fourmeme';
let activeCheck = null;

function esc(value) {
  return String(value == null ? '' : value)
    .replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;').replace(/'/g, '&#39;');
}

// Links from token metadata are creator-controlled
function safeUrl(value) {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:' ? url.href : null;
  } catch (err) {
    return null;
  }
}

function explorerLink(address, tokenType) {
  const base = tokenType === 'pumpfun' ? 'https://solscan.io/account/' : 'https://bscscan.com/address/';
  return '<a href="' + base + esc(address) + '" target="_blank" rel="noopener">' + esc(address) + '</a>';
}

function fmtCompact(n, suffix) {
  if (n >= 1e9) return (n / 1e9).toFixed(2) + 'B' + suffix;
  if (n >= 1e6) return (n / 1e6).toFixed(2) + 'M' + suffix;
  if (n >= 1e3) return (n / 1e3).toFixed(2) + 'K' + suffix;
  return null;
}

function fmtAmount(value, tokenType) {
  const n = Number(value);
  if (!n || !isFinite(n)) return '0';
  const sign = n < 0 ? '-' : '';
  const abs = Math.abs(n);
  if (tokenType === 'pumpfun' || abs >= 1e18) {
    const tokens = tokenType === 'pumpfun' ? abs : abs / 1e18;
    return sign + (fmtCompact(tokens, '') || tokens.toLocaleString('en-US', { maximumFractionDigits: 4 }));
  }
  return sign + (fmtCompact(abs, ' (raw)') || abs.toLocaleString('en-US', { maximumFractionDigits: 2 }));
}

function fmtTime(ts) {
  if (!ts) return 'N/A';
  const d = new Date(ts);
  return isNaN(d.getTime()) ? esc(ts) : d.toISOString().replace('T', ' ').slice(0, 19) + ' UTC';
}

function fmtPct(n) { return Number(n).toFixed(2) + '%'; }

function statCard(label, value, cls) {
  return '<div class="card"><h3>' + label + '</h3><div class="value ' + (cls || '') + '">' + value + '</div></div>';
}

function renderHolders(data) {
  let html = '';
  const h = data.holder_analysis;
  if (h) {
    const mark = ok => ok ? '<span class="green">PASS</span>' : '<span class="red">FAIL</span>';
    html += '<div class="card"><h3>Holder analysis</h3>' +
      '<div>Creator holding: ' + fmtPct(h.creator_percent) + ' ' + mark(h.creator_check_passed) + '</div>' +
      '<div>No other holder above 5%: ' + mark(h.other_holders_check_passed) + '</div>' +
      '<div>Top 10 holders: ' + fmtPct(h.top10_percent) + ' ' + mark(h.top10_check_passed) + '</div>' +
      '<div class="muted">Circulating supply ' + fmtAmount(h.circulating_supply, 'pumpfun') +
      ', burned ' + fmtAmount(h.burned_amount, 'pumpfun') + '</div></div>';
  }
  const top = data.top_holders || [];
  if (top.length > 0) {
    html += '<div class="card"><h3>Top holders</h3><table><thead><tr>' +
      '<th>#</th><th>Address</th><th>Amount</th><th>%</th><th>Trades (6h)</th><th>Pump tokens</th></tr></thead><tbody>' +
      top.map((t, i) => '<tr><td>' + (i + 1) + '</td><td class="mono">' + explorerLink(t.address, 'pumpfun') +
        (t.is_bonding_curve ? '<span class="tag">bonding curve</span>' : '') +
        (t.is_ai_agent ? '<span class="tag">AI agent</span>' : '') +
        '</td><td>' + fmtAmount(t.amount, 'pumpfun') + '</td><td>' + fmtPct(t.percent) +
        '</td><td>' + t.trades_6h + '</td><td>' + t.pump_tokens_count + '</td></tr>').join('') +
      '</tbody></table></div>';
  }
  return html;
}

function renderMetadata(data) {
  const m = data.token_metadata;
  if (!m) return '';
  const links = ['website', 'twitter', 'telegram']
    .filter(k => m[k] && safeUrl(m[k]))
    .map(k => '<a href="' + esc(safeUrl(m[k])) + '" target="_blank" rel="noopener noreferrer">' + k + '</a>')
    .join(' · ');
  return '<div class="card"><h3>Token</h3>' +
    '<div class="value blue">' + esc(m.name || 'Unknown') + ' <span class="muted">' + esc(m.symbol || '') + '</span></div>' +
    (m.description ? '<div class="muted">' + esc(m.description) + '</div>' : '') +
    '<div class="muted">Created ' + fmtTime(m.created_at) + (m.is_mayhem_mode ? ' · mayhem mode' : '') + '</div>' +
    (data.liquidity_sol !== undefined ? '<div>Liquidity: ' + Number(data.liquidity_sol).toFixed(2) + ' SOL</div>' : '') +
    (links ? '<div>' + links + '</div>' : '') + '</div>';
}

function renderResult(body) {
  const el = document.getElementById('result');
  if (!body.success) {
    const cls = body.error_type === 'info' ? 'info' : 'error';
    el.innerHTML = '<div class="banner ' + cls + '">' + esc(body.error) + '</div>';
    return;
  }

  currentTokenType = body.token_type;
  const d = body.data;
  const scoreCls = d.risk_score >= 80 ? 'green' : d.risk_score >= 60 ? 'yellow' : 'red';
  let html = body.phishy
    ? '<div class="banner phishy">TOKEN IS PHISHY: ' + d.phishy_count + ' suspicious address(es)</div>'
    : '<div class="banner safe">Token appears to be safe (no phishy behavior detected)</div>';

  html += '<div class="grid">' +
    statCard('Addresses', d.total_addresses, 'blue') +
    statCard('Phishy', d.phishy_count, d.phishy_count > 0 ? 'red' : 'green') +
    statCard('Normal', d.normal_count, 'green') +
    statCard('Risk score', d.risk_score + '/100', scoreCls) +
    '</div>';

  html += renderMetadata(d) + renderHolders(d);

  if (d.totals) {
    html += '<div class="card"><h3>Phishy totals</h3>' +
      '<div>Transferred: ' + fmtAmount(d.totals.total_transferred, currentTokenType) + '</div>' +
      '<div>Bought: ' + fmtAmount(d.totals.total_bought, currentTokenType) + '</div>' +
      '<div class="red">Without purchase: ' + fmtAmount(d.totals.total_without_buy, currentTokenType) + '</div></div>';
  }

  if (d.phishy_addresses.length > 0) {
    html += '<div class="card"><h3>Phishy addresses</h3><table><thead><tr>' +
      '<th>Address</th><th>First transfer</th><th>First buy</th><th>Transferred</th><th>Bought</th><th>Reason</th></tr></thead><tbody>' +
      d.phishy_addresses.map(p => '<tr><td class="mono">' + explorerLink(p.address, currentTokenType) + '</td><td>' +
        fmtTime(p.first_transfer_time) + '</td><td>' + fmtTime(p.first_buy_time) + '</td><td>' +
        fmtAmount(p.total_transferred, currentTokenType) + '</td><td>' + fmtAmount(p.total_bought, currentTokenType) +
        '</td><td>' + esc(p.reason) + '</td></tr>').join('') +
      '</tbody></table></div>';
  }

  el.innerHTML = html;
}

async function loadRecent() {
  const el = document.getElementById('recent');
  try {
    const body = await fetch('/api/recent-phishy').then(r => r.json());
    if (!body.success || body.tokens.length === 0) {
      el.textContent = 'No phishy tokens found yet.';
      return;
    }
    el.innerHTML = '<div class="muted">Click a row to check it again.</div>' +
      '<table><thead><tr><th>Token</th><th>Type</th><th>Phishy</th><th>Checked</th></tr></thead><tbody>' +
      body.tokens.map(t => '<tr class="recheck" data-token="' + esc(t.token_address) + '"><td class="mono">' + explorerLink(t.token_address, t.token_type) + '</td><td>' +
        (t.token_type === 'pumpfun' ? 'Pump.fun' : 'Four.Meme') + '</td><td class="red">' + t.phishy_count +
        '</td><td>' + fmtTime(t.timestamp) + '</td></tr>').join('') +
      '</tbody></table>';
  } catch (err) {
    el.textContent = 'Could not load recent tokens: ' + err.message;
  }
}

async function runCheck(tokenAddress, bondingCurve) {
  if (activeCheck) activeCheck.abort();
  const controller = new AbortController();
  activeCheck = controller;

  const button = document.getElementById('checkButton');
  const cancel = document.getElementById('cancelButton');
  const result = document.getElementById('result');
  const payload = { token_address: tokenAddress };
  if (bondingCurve) payload.bonding_curve = bondingCurve;

  button.disabled = true;
  button.textContent = 'Checking... (this can take a minute)';
  cancel.classList.remove('hidden');
  result.innerHTML = '';
  try {
    const response = await fetch('/api/check', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
      signal: controller.signal,
    });
    renderResult(await response.json());
    loadRecent();
  } catch (err) {
    // A newer check replaced this one
    if (activeCheck !== controller) return;
    if (err.name === 'AbortError') {
      renderResult({ success: false, error_type: 'info', error: 'Check cancelled.' });
    } else {
      renderResult({ success: false, error: 'Request failed: ' + err.message });
    }
  } finally {
    if (activeCheck === controller) {
      activeCheck = null;
      button.disabled = false;
      button.textContent = 'Check token';
      cancel.classList.add('hidden');
    }
  }
}

document.getElementById('checkForm').addEventListener('submit', (event) => {
  event.preventDefault();
  runCheck(
    document.getElementById('tokenAddress').value.trim(),
    document.getElementById('bondingCurve').value.trim()
  );
});

document.getElementById('cancelButton').addEventListener('click', () => {
  if (activeCheck) activeCheck.abort();
});

// Rows are re-checked through a delegated listener; the CSP blocks inline handlers
document.getElementById('recent').addEventListener('click', (event) => {
  if (event.target.closest('a')) return;
  const row = event.target.closest('tr[data-token]');
  if (!row) return;
  document.getElementById('tokenAddress').value = row.dataset.token;
  document.getElementById('bondingCurve').value = '';
  window.scrollTo({ top: 0, behavior: 'smooth' });
  runCheck(row.dataset.token, '');
});

loadRecent();
</script>
</body>
</html>`;
}
