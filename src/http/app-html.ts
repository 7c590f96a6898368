/**
 * Operator UI - single-page HTML served at `/`.
 *
 * Talks to the JSON API with `fetch`: client list and editor, logo upload
 * and replacement, report generation with download links, template list.
 * Brand fields reach the client table through `textContent` and element
 * properties, never through markup.
 *
 * @module http/app-html
 */

export function getAppHtml(version: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>Client Report Engine</title>
<style>
  * { margin: 0; padding: 0; box-sizing: border-box; }
  body { font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, sans-serif; background: #f6f8fa; color: #24292f; }
  header { background: #004481; color: #fff; padding: 14px 24px; display: flex; justify-content: space-between; align-items: center; }
  header h1 { font-size: 18px; }
  nav button { background: none; border: none; color: #c8d9ec; font-size: 14px; margin-left: 16px; cursor: pointer; }
  nav button.active { color: #fff; font-weight: 700; }
  main { max-width: 960px; margin: 24px auto; padding: 0 16px; }
  .view { display: none; }
  .view.active { display: block; }
  .card { background: #fff; border: 1px solid #d0d7de; border-radius: 6px; padding: 16px; margin-bottom: 16px; }
  .card h2 { font-size: 15px; margin-bottom: 12px; }
  label { display: block; font-size: 12px; color: #57606a; margin: 8px 0 4px; }
  input, select, textarea { width: 100%; padding: 6px 8px; border: 1px solid #d0d7de; border-radius: 4px; font-size: 13px; }
  textarea { min-height: 90px; font-family: monospace; }
  .row { display: grid; grid-template-columns: 1fr 1fr; gap: 12px; }
  .actions { margin-top: 12px; display: flex; gap: 8px; }
  .btn { background: #004481; color: #fff; border: none; border-radius: 4px; padding: 7px 14px; cursor: pointer; font-size: 13px; }
  .btn.secondary { background: #eaeef2; color: #24292f; }
  .btn.danger { background: #cf222e; }
  table { width: 100%; border-collapse: collapse; }
  th { text-align: left; padding: 8px; border-bottom: 2px solid #d0d7de; color: #57606a; font-size: 12px; text-transform: uppercase; }
  td { padding: 8px; border-bottom: 1px solid #eaeef2; font-size: 13px; }
  .rec-row { display: grid; grid-template-columns: 110px 1fr 2fr auto; gap: 8px; margin-bottom: 6px; }
  .logo-cell input { margin-top: 4px; font-size: 11px; }
  .swatch { display: inline-block; width: 14px; height: 14px; border-radius: 3px; border: 1px solid #d0d7de; vertical-align: middle; margin-right: 4px; }
  #status { font-size: 12px; }
  #message { margin-bottom: 16px; font-size: 13px; }
  .error { color: #cf222e; }
  .ok { color: #1a7f37; }
</style>
</head>
<body>
<header>
  <h1>Client Report Engine <small>v${version}</small></h1>
  <nav>
    <span id="status">Checking API...</span>
    <button data-view="clients" class="active">Clients</button>
    <button data-view="generate">Generate</button>
    <button data-view="templates">Templates</button>
  </nav>
</header>
<main>
  <div id="message"></div>

  <section id="clients-view" class="view active">
    <div class="card">
      <h2 id="client-form-title">New client</h2>
      <form id="client-form">
        <div class="row">
          <div><label>Client ID</label><input id="client-id" required></div>
          <div><label>Display name</label><input id="display-name" required></div>
          <div><label>Primary color</label><input id="primary-color" placeholder="#004481"></div>
          <div><label>Secondary color</label><input id="secondary-color" placeholder="#ffffff"></div>
          <div><label>Font family</label><input id="font-family" placeholder="Roboto"></div>
          <div><label>Website</label><input id="website-url" placeholder="https://example.com"></div>
        </div>
        <div class="actions">
          <button class="btn" type="submit">Save</button>
          <button class="btn secondary" type="button" id="client-reset">Clear</button>
        </div>
      </form>
    </div>
    <div class="card">
      <h2>Clients</h2>
      <table>
        <thead><tr><th>ID</th><th>Name</th><th>Colors</th><th>Logo</th><th></th></tr></thead>
        <tbody id="clients-table"></tbody>
      </table>
    </div>
  </section>

  <section id="generate-view" class="view">
    <div class="card">
      <h2>Generate report</h2>
      <form id="report-form">
        <div class="row">
          <div><label>Client</label><select id="report-client" required></select></div>
          <div><label>Template</label><select id="report-template" required></select></div>
          <div><label>Report date</label><input id="report-date" placeholder="defaults to today"></div>
          <div><label>Report period</label><input id="report-period" placeholder="Q1 2026"></div>
          <div><label>Prepared by</label><input id="prepared-by"></div>
          <div><label>Output file name</label><input id="output-filename" placeholder="optional, e.g. acme_q1.docx"></div>
        </div>
        <label>Executive summary</label><textarea id="executive-summary"></textarea>
        <label>Metrics (JSON array of {name, value, change, status})</label><textarea id="metrics">[]</textarea>
        <label>Highlights (one per line)</label><textarea id="highlights"></textarea>
        <label>Recommendations</label>
        <div id="recommendations-list"></div>
        <button class="btn secondary" type="button" id="add-recommendation">Add recommendation</button>
        <div class="row">
          <div><label>Contact name</label><input id="contact-name"></div>
          <div><label>Contact title</label><input id="contact-title"></div>
          <div><label>Contact email</label><input id="contact-email"></div>
          <div><label>Contact phone</label><input id="contact-phone"></div>
        </div>
        <label>Extra context (JSON object, overrides any field above)</label><textarea id="extra-context">{}</textarea>
        <label><input type="checkbox" id="generate-pdf" style="width:auto"> Also convert to PDF</label>
        <div class="actions"><button class="btn" type="submit">Generate</button></div>
      </form>
    </div>
    <div class="card"><h2>Result</h2><div id="report-result">No report generated yet.</div></div>
  </section>

  <section id="templates-view" class="view">
    <div class="card"><h2>Templates</h2><ul id="templates-list"></ul></div>
  </section>
</main>

<script>
// escHtml: encode HTML entities before inserting untrusted text via innerHTML
function escHtml(s) { var d = document.createElement('div'); d.appendChild(document.createTextNode(String(s == null ? '' : s))); return d.innerHTML; }
function baseName(p) { return String(p).split(/[\\\\/]/).pop(); }

function showMessage(text, isError) {
  var el = document.getElementById('message');
  el.className = isError ? 'error' : 'ok';
  el.textContent = text;
}

async function api(path, options) {
  var res = await fetch(path, options);
  var body = await res.json().catch(function() { return {}; });
  if (!res.ok) {
    var detail = Array.isArray(body.detail) ? body.detail.join('; ') : body.detail;
    throw new Error(detail || ('HTTP ' + res.status));
  }
  return body;
}

function switchView(name) {
  document.querySelectorAll('nav button').forEach(function(b) { b.classList.toggle('active', b.dataset.view === name); });
  document.querySelectorAll('.view').forEach(function(v) { v.classList.toggle('active', v.id === name + '-view'); });
  if (name === 'clients') loadClients();
  if (name === 'generate') { loadClientOptions(); loadTemplateOptions(); }
  if (name === 'templates') loadTemplates();
}

function optional(id) { var v = document.getElementById(id).value.trim(); return v === '' ? null : v; }

function swatch(color) {
  var span = document.createElement('span');
  span.className = 'swatch';
  span.style.background = color || '#fff';
  return span;
}

function cell(tr) { var td = document.createElement('td'); tr.appendChild(td); return td; }

async function loadClients() {
  var clients = await api('/clients');
  var tbody = document.getElementById('clients-table');
  tbody.innerHTML = '';
  clients.forEach(function(c) {
    var tr = document.createElement('tr');
    cell(tr).textContent = c.client_id;
    cell(tr).textContent = c.display_name;
    var colors = cell(tr);
    colors.appendChild(swatch(c.primary_color));
    colors.appendChild(swatch(c.secondary_color));

    var logo = cell(tr);
    logo.className = 'logo-cell';
    logo.textContent = c.logo_path ? baseName(c.logo_path) : 'none';
    var fileInput = document.createElement('input');
    fileInput.type = 'file';
    fileInput.accept = 'image/*';
    fileInput.title = c.logo_path ? 'Replace logo' : 'Upload logo';
    fileInput.onchange = function() { uploadLogo(c.client_id, fileInput.files[0]); };
    logo.appendChild(fileInput);

    var actions = cell(tr);
    actions.innerHTML = '<button class="btn secondary" data-act="edit">Edit</button> <button class="btn danger" data-act="delete">Delete</button>';
    actions.querySelector('[data-act="edit"]').onclick = function() { editClient(c); };
    actions.querySelector('[data-act="delete"]').onclick = function() { deleteClient(c.client_id); };
    tbody.appendChild(tr);
  });
}

function editClient(c) {
  document.getElementById('client-form-title').textContent = 'Edit ' + c.client_id;
  document.getElementById('client-id').value = c.client_id;
  document.getElementById('display-name').value = c.display_name;
  document.getElementById('primary-color').value = c.primary_color || '';
  document.getElementById('secondary-color').value = c.secondary_color || '';
  document.getElementById('font-family').value = c.font_family || '';
  document.getElementById('website-url').value = c.website_url || '';
}

function resetClientForm() {
  document.getElementById('client-form').reset();
  document.getElementById('client-form-title').textContent = 'New client';
}

async function saveClient(e) {
  e.preventDefault();
  try {
    var saved = await api('/clients', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        client_id: document.getElementById('client-id').value.trim(),
        display_name: document.getElementById('display-name').value.trim(),
        primary_color: optional('primary-color'),
        secondary_color: optional('secondary-color'),
        font_family: optional('font-family'),
        website_url: optional('website-url'),
      }),
    });
    showMessage('Saved ' + saved.client_id, false);
    resetClientForm();
    loadClients();
  } catch (err) { showMessage(err.message, true); }
}

async function deleteClient(id) {
  if (!confirm('Delete client ' + id + '?')) return;
  try { await api('/clients/' + encodeURIComponent(id), { method: 'DELETE' }); showMessage('Deleted ' + id, false); loadClients(); }
  catch (err) { showMessage(err.message, true); }
}

async function uploadLogo(id, file) {
  if (!file) return;
  var form = new FormData();
  form.append('file', file);
  try { await api('/clients/' + encodeURIComponent(id) + '/logo', { method: 'POST', body: form }); showMessage('Logo uploaded for ' + id, false); loadClients(); }
  catch (err) { showMessage(err.message, true); }
}

async function loadClientOptions() {
  var clients = await api('/clients');
  var select = document.getElementById('report-client');
  select.innerHTML = '';
  clients.forEach(function(c) { var o = document.createElement('option'); o.value = c.client_id; o.textContent = c.display_name; select.appendChild(o); });
}

async function loadTemplateOptions() {
  var data = await api('/templates');
  var select = document.getElementById('report-template');
  select.innerHTML = '';
  data.templates.forEach(function(t) { var o = document.createElement('option'); o.value = t; o.textContent = t; select.appendChild(o); });
}

async function loadTemplates() {
  var data = await api('/templates');
  var list = document.getElementById('templates-list');
  list.innerHTML = '';
  if (data.templates.length === 0) { list.innerHTML = '<li>No templates found in reports/templates.</li>'; return; }
  data.templates.forEach(function(t) { var li = document.createElement('li'); li.textContent = t; list.appendChild(li); });
}

function addRecommendation() {
  var row = document.createElement('div');
  row.className = 'rec-row';
  row.innerHTML =
    '<select data-field="priority"><option>High</option><option selected>Medium</option><option>Low</option></select>' +
    '<input data-field="title" placeholder="Title">' +
    '<input data-field="description" placeholder="Description">' +
    '<button class="btn secondary" type="button">Remove</button>';
  row.querySelector('button').onclick = function() { row.remove(); };
  document.getElementById('recommendations-list').appendChild(row);
}

function collectRecommendations() {
  var items = [];
  document.querySelectorAll('#recommendations-list .rec-row').forEach(function(row) {
    var title = row.querySelector('[data-field="title"]').value.trim();
    if (!title) return;
    items.push({
      priority: row.querySelector('[data-field="priority"]').value,
      title: title,
      description: row.querySelector('[data-field="description"]').value.trim(),
    });
  });
  return items;
}

function collectContact() {
  var name = optional('contact-name');
  if (!name) return null;
  return { name: name, title: optional('contact-title'), email: optional('contact-email'), phone: optional('contact-phone') };
}

async function generateReport(e) {
  e.preventDefault();
  var result = document.getElementById('report-result');
  try {
    var highlights = document.getElementById('highlights').value.split('\\n').map(function(s) { return s.trim(); }).filter(Boolean);
    var report = await api('/reports/generate', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        client_id: document.getElementById('report-client').value,
        template_name: document.getElementById('report-template').value,
        report_date: optional('report-date'),
        report_period: optional('report-period'),
        prepared_by: optional('prepared-by'),
        executive_summary: optional('executive-summary'),
        metrics: JSON.parse(document.getElementById('metrics').value || '[]'),
        highlights: highlights,
        recommendations: collectRecommendations(),
        contact: collectContact(),
        extra_context: JSON.parse(document.getElementById('extra-context').value || '{}'),
        generate_pdf: document.getElementById('generate-pdf').checked,
        output_filename: optional('output-filename'),
      }),
    });
    var links = '<a href="/reports/download/' + encodeURIComponent(baseName(report.docx_path)) + '">' + escHtml(baseName(report.docx_path)) + '</a>';
    if (report.pdf_path) links += ' | <a href="/reports/download/' + encodeURIComponent(baseName(report.pdf_path)) + '">' + escHtml(baseName(report.pdf_path)) + '</a>';
    result.innerHTML = 'Generated ' + escHtml(report.generated_at) + ': ' + links;
  } catch (err) { result.innerHTML = '<span class="error">' + escHtml(err.message) + '</span>'; }
}

document.querySelectorAll('nav button').forEach(function(b) { b.onclick = function() { switchView(b.dataset.view); }; });
document.getElementById('client-form').addEventListener('submit', saveClient);
document.getElementById('client-reset').addEventListener('click', resetClientForm);
document.getElementById('report-form').addEventListener('submit', generateReport);
document.getElementById('add-recommendation').addEventListener('click', addRecommendation);

api('/health').then(function(h) {
  document.getElementById('status').textContent = h.status === 'healthy' ? 'Connected' : 'Degraded';
}).catch(function() { document.getElementById('status').textContent = 'Offline'; });
loadClients().catch(function(err) { showMessage(err.message, true); });
</script>
</body>
</html>`;
}
