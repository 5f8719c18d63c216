export const GENERATED_TOKEN = "__GENERATED__";
export const COUNT_TOKEN = "__COUNT__";
export const ITEMS_TOKEN = "__ITEMS_JSON__";

export const SITE_TEMPLATE = `<!doctype html>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>Ringside Wire</title>
<style>
  body { font-family: system-ui, Arial; margin: 18px; }
  header { display: flex; flex-wrap: wrap; gap: 12px; align-items: baseline; }
  .meta { color: #555; font-size: 13px; }
  .controls { display: flex; gap: 8px; flex-wrap: wrap; margin: 12px 0; }
  input, select { padding: 8px 10px; border: 1px solid #ddd; border-radius: 10px; }
  .grid { display: grid; grid-template-columns: repeat(auto-fit, minmax(320px, 1fr)); gap: 12px; }
  .card { border: 1px solid #ddd; border-radius: 14px; padding: 12px; background: #fff; }
  .pill { display: inline-block; font-size: 12px; padding: 3px 8px; border: 1px solid #eee; border-radius: 999px; margin-right: 6px; }
  h3 { margin: 10px 0 6px; font-size: 16px; line-height: 1.25; }
  a { color: inherit; }
</style>

<header>
  <h1 style="margin:0">Ringside Wire</h1>
  <div class="meta">Generated: ${GENERATED_TOKEN} · Items: ${COUNT_TOKEN}</div>
</header>

<div class="controls">
  <input id="q" placeholder="Search title, domain or source..." style="flex:1; min-width: 240px;">
  <select id="sport">
    <option value="">All sports</option>
    <option value="MMA">MMA</option>
    <option value="Boxing">Boxing</option>
    <option value="Mixed">Mixed</option>
    <option value="Other">Other</option>
  </select>
  <select id="source">
    <option value="">All sources</option>
  </select>
</div>

<div id="count" class="meta"></div>
<div id="grid" class="grid"></div>

<script>
const ITEMS = ${ITEMS_TOKEN};

const qEl = document.getElementById('q');
const sportEl = document.getElementById('sport');
const sourceEl = document.getElementById('source');
const gridEl = document.getElementById('grid');
const countEl = document.getElementById('count');

function uniq(arr) {
  return Array.from(new Set(arr)).sort();
}

function escapeHtml(s) {
  return (s || '')
    .replaceAll('&', '&amp;')
    .replaceAll('<', '&lt;')
    .replaceAll('>', '&gt;')
    .replaceAll('"', '&quot;');
}

function initSources() {
  for (const s of uniq(ITEMS.map(x => x.source).filter(Boolean))) {
    const opt = document.createElement('option');
    opt.value = s;
    opt.textContent = s;
    sourceEl.appendChild(opt);
  }
}

function render() {
  const q = (qEl.value || '').toLowerCase().trim();
  const sport = sportEl.value;
  const source = sourceEl.value;

  const filtered = ITEMS.filter(x => {
    if (sport && x.sport !== sport) return false;
    if (source && x.source !== source) return false;
    if (!q) return true;
    return (x.title + ' ' + x.domain + ' ' + x.source).toLowerCase().includes(q);
  });

  countEl.textContent = 'Showing ' + filtered.length + ' of ' + ITEMS.length;
  gridEl.innerHTML = '';

  for (const x of filtered) {
    const div = document.createElement('div');
    div.className = 'card';
    div.innerHTML =
      '<div>' +
        '<span class="pill">' + escapeHtml(x.sport) + '</span>' +
        '<span class="pill">' + escapeHtml(x.source) + '</span>' +
        '<span class="pill">' + escapeHtml(x.domain) + '</span>' +
      '</div>' +
      '<h3><a href="' + escapeHtml(x.url) + '" target="_blank" rel="noreferrer">' + escapeHtml(x.title) + '</a></h3>' +
      '<div class="meta">Published: ' + escapeHtml(x.published || '-') + ' · Fetched: ' + escapeHtml(x.fetchedAt || '-') + '</div>' +
      '<p class="meta" style="margin-top:10px">' + escapeHtml(x.preview || '') + '</p>';
    gridEl.appendChild(div);
  }
}

qEl.addEventListener('input', render);
sportEl.addEventListener('change', render);
sourceEl.addEventListener('change', render);

initSources();
render();
</script>
`;
