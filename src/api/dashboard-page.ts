// ---------------------------------------------------------------------------
// Single-page dashboard shell. Draws the JSON page APIs in the browser.
// ---------------------------------------------------------------------------

import type { DashboardProfile } from "../core/types.js";

const PAGE_LABELS: Record<string, string> = {
  overview: "Overview",
  search: "Search",
  statistics: "Statistics",
  about: "About",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => {
    switch (ch) {
      case "&": return "&amp;";
      case "<": return "&lt;";
      case ">": return "&gt;";
      case '"': return "&quot;";
      default: return "&#39;";
    }
  });
}

/** JSON safe to embed in a `<script>` element. */
function inlineJson(value: unknown): string {
  return JSON.stringify(value).replace(/</g, "\\u003c");
}

export function renderDashboardPage(profile: DashboardProfile): string {
  const nav = profile.pages
    .map((page) => `<button type="button" data-page="${page}">${PAGE_LABELS[page] ?? page}</button>`)
    .join("\n          ");

  return `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>${escapeHtml(profile.title)}</title>
    <style>
      :root {
        --bg: #f7f4ee;
        --panel: #ffffff;
        --text: #2b2622;
        --muted: #7a6f66;
        --line: #e2d9cc;
        --accent: #8c3b2b;
        --ok: #2f7d4f;
        --warn: #a86b00;
        --danger: #b3261e;
        --sans: ui-sans-serif, system-ui, -apple-system, Segoe UI, Roboto, Helvetica, Arial;
      }
      html, body { margin: 0; background: var(--bg); color: var(--text); font-family: var(--sans); }
      .layout { display: grid; grid-template-columns: 240px 1fr; min-height: 100vh; }
      aside { border-right: 1px solid var(--line); padding: 20px 16px; background: var(--panel); }
      aside h2 { font-size: 15px; margin: 0 0 12px; }
      nav { display: grid; gap: 6px; }
      nav button, .btn {
        text-align: left; padding: 9px 12px; border-radius: 8px; cursor: pointer;
        border: 1px solid var(--line); background: transparent; color: var(--text); font-size: 14px;
      }
      nav button.active { background: var(--accent); border-color: var(--accent); color: #fff; }
      main { padding: 24px 28px 60px; max-width: 1100px; }
      h1 { margin: 0 0 18px; font-size: 28px; }
      .notice { padding: 10px 12px; border-radius: 8px; margin: 12px 0; font-size: 14px; }
      .notice.success { background: rgba(47,125,79,0.1); color: var(--ok); }
      .notice.info { background: rgba(140,59,43,0.08); color: var(--accent); }
      .notice.warning { background: rgba(168,107,0,0.1); color: var(--warn); }
      .notice.error { background: rgba(179,38,30,0.1); color: var(--danger); }
      .metrics { display: grid; grid-template-columns: repeat(auto-fit, minmax(170px, 1fr)); gap: 12px; }
      .metric { background: var(--panel); border: 1px solid var(--line); border-radius: 10px; padding: 14px; }
      .metric .label { color: var(--muted); font-size: 12px; }
      .metric .value { font-size: 24px; font-weight: 650; margin-top: 4px; }
      .card { background: var(--panel); border: 1px solid var(--line); border-radius: 10px; padding: 16px; margin-top: 16px; }
      .card h3 { margin: 0 0 12px; font-size: 16px; }
      .bars { display: grid; gap: 6px; }
      .bar { display: grid; grid-template-columns: 140px 1fr 48px; gap: 8px; align-items: center; font-size: 13px; }
      .bar .fill { height: 14px; background: var(--accent); border-radius: 3px; }
      .pie { display: flex; gap: 20px; align-items: center; }
      .pie .disc { width: 160px; height: 160px; border-radius: 50%; }
      .legend { display: grid; gap: 4px; font-size: 13px; }
      .swatch { display: inline-block; width: 10px; height: 10px; border-radius: 2px; margin-right: 6px; }
      table { border-collapse: collapse; width: 100%; font-size: 13px; }
      th, td { border-bottom: 1px solid var(--line); padding: 6px 8px; text-align: left; }
      th { color: var(--muted); font-weight: 600; }
      .filters { display: grid; grid-template-columns: repeat(auto-fit, minmax(180px, 1fr)); gap: 10px; }
      input[type="text"], select {
        width: 100%; padding: 8px 10px; border: 1px solid var(--line); border-radius: 8px;
        background: #fff; font-size: 14px; box-sizing: border-box;
      }
      footer { margin-top: 40px; color: var(--muted); font-size: 13px; text-align: center; }
      @media (max-width: 760px) { .layout { grid-template-columns: 1fr; } }
    </style>
  </head>
  <body>
    <div class="layout">
      <aside>
        <h2>Navigation</h2>
        <nav id="nav">
          ${nav}
        </nav>
        <h2 style="margin-top:24px;">Upload Your Data</h2>
        <input id="file" type="file" accept=".csv,text/csv" />
        <div id="sourceNotice"></div>
      </aside>
      <main>
        <h1>${escapeHtml(profile.title)}</h1>
        <div id="view"></div>
        <footer>${escapeHtml(profile.footer)}</footer>
      </main>
    </div>

    <script>
      const PAGES = ${inlineJson(profile.pages)};
      const viewEl = document.getElementById('view');
      const sourceNoticeEl = document.getElementById('sourceNotice');
      const fileEl = document.getElementById('file');
      const COLORS = ['#8c3b2b', '#c9893f', '#5b7f6e', '#3f5f8c', '#7b4f8c', '#b5a642', '#4f8c8a', '#8c6b4f'];
      const searchState = { q: '', filters: {} };

      function esc(s) {
        return String(s).replace(/[&<>"']/g, (c) => ({'&':'&amp;','<':'&lt;','>':'&gt;','"':'&quot;',"'":'&#39;'}[c]));
      }

      function notice(n) {
        return n ? '<div class="notice ' + esc(n.level) + '">' + esc(n.message) + '</div>' : '';
      }

      function metric(label, value) {
        return '<div class="metric"><div class="label">' + esc(label) + '</div><div class="value">' + esc(value) + '</div></div>';
      }

      function bars(labels, values) {
        if (labels.length === 0) return '<div class="notice warning">No data.</div>';
        const max = Math.max(1, ...values);
        return '<div class="bars">' + labels.map((label, i) =>
          '<div class="bar"><span>' + esc(label) + '</span><div class="fill" style="width:' +
          (values[i] / max * 100) + '%"></div><span>' + esc(values[i]) + '</span></div>').join('') + '</div>';
      }

      function chart(spec) {
        if (!spec) return '<div class="notice warning">Not available for this dataset.</div>';
        let body = '';
        if (spec.kind === 'bar') {
          body = bars(spec.categories, spec.values);
        } else if (spec.kind === 'histogram') {
          body = bars(spec.bins.map((b) => Math.round(b.start) + '–' + Math.round(b.end)), spec.bins.map((b) => b.count));
        } else if (spec.kind === 'pie') {
          let acc = 0;
          const stops = spec.slices.map((s, i) => {
            const from = acc;
            acc += s.percentage;
            return COLORS[i % COLORS.length] + ' ' + from + '% ' + acc + '%';
          });
          body = '<div class="pie"><div class="disc" style="background:conic-gradient(' + stops.join(',') + ')"></div>' +
            '<div class="legend">' + spec.slices.map((s, i) =>
              '<div><span class="swatch" style="background:' + COLORS[i % COLORS.length] + '"></span>' +
              esc(s.label) + ' (' + esc(s.value) + ', ' + esc(s.percentage) + '%)</div>').join('') + '</div></div>';
        }
        return '<div class="card"><h3>' + esc(spec.title) + '</h3>' + body + '</div>';
      }

      function table(columns, rows) {
        const head = '<tr>' + columns.map((c) => '<th>' + esc(c) + '</th>').join('') + '</tr>';
        const body = rows.map((r) => '<tr>' + columns.map((c) =>
          '<td>' + (r[c] === null || r[c] === undefined ? '' : esc(r[c])) + '</td>').join('') + '</tr>').join('');
        return '<div style="overflow:auto;"><table>' + head + body + '</table></div>';
      }

      async function getJson(url) {
        const resp = await fetch(url, { headers: { accept: 'application/json' } });
        const data = await resp.json();
        if (!resp.ok) throw new Error(data && data.error ? data.error : 'HTTP ' + resp.status);
        return data;
      }

      function searchQuery() {
        const params = new URLSearchParams();
        if (searchState.q) params.set('q', searchState.q);
        for (const [field, value] of Object.entries(searchState.filters)) {
          if (value && value !== 'All') params.set('f.' + field, value);
        }
        return params.toString();
      }

      const renderers = {
        async overview() {
          const d = await getJson('/api/overview');
          const m = d.metrics;
          const range = typeof m.yearRange === 'object' ? m.yearRange.min + '–' + m.yearRange.max : m.yearRange;
          viewEl.innerHTML = '<h2>Overview</h2><div class="metrics">' +
            metric('Total Inscriptions', m.totalRecords) + metric('Unique People', m.uniquePeople) +
            metric('Male', m.maleCount) + metric('Female', m.femaleCount) +
            metric('Year Range', range) + metric('Most Common Gender', m.mostCommonGender) + '</div>' +
            chart(d.timeline) +
            '<div class="card"><h3>Recent Inscriptions</h3>' + table(d.recent.columns, d.recent.rows) + '</div>';
        },

        async search() {
          const d = await getJson('/api/search?' + searchQuery());
          const selects = Object.entries(d.options).map(([field, opts]) =>
            '<label>' + esc(field) + '<select data-field="' + esc(field) + '">' + opts.map((o) =>
              '<option' + (searchState.filters[field] === o ? ' selected' : '') + '>' + esc(o) + '</option>').join('') +
            '</select></label>').join('');
          viewEl.innerHTML = '<h2>Search Inscriptions</h2><div class="filters">' +
            '<label>Search<input id="q" type="text" value="' + esc(searchState.q) + '" placeholder="Any field..." /></label>' +
            selects + '</div>' + notice(d.notice) +
            (d.total > 0
              ? table(d.columns, d.rows) + '<p><a class="btn" href="/api/search/export?' + esc(searchQuery()) + '">Download Results as CSV</a></p>'
              : '');
          const qEl = document.getElementById('q');
          qEl.addEventListener('change', () => { searchState.q = qEl.value; show('search'); });
          for (const sel of viewEl.querySelectorAll('select[data-field]')) {
            sel.addEventListener('change', () => { searchState.filters[sel.dataset.field] = sel.value; show('search'); });
          }
        },

        async statistics() {
          const d = await getJson('/api/statistics');
          const y = d.years;
          viewEl.innerHTML = '<h2>Statistics &amp; Analysis</h2>' +
            d.sections.map((s) => s.available ? chart(s.chart)
              : '<div class="card"><h3>' + esc(s.label) + '</h3>' + notice({ level: 'warning', message: 'Column "' + s.field + '" is not available.' }) + '</div>').join('') +
            '<div class="metrics" style="margin-top:16px;">' +
            metric('Male', d.genderCounts.male) + metric('Female', d.genderCounts.female) +
            metric('Earliest Year', typeof y === 'object' ? y.earliest : y) +
            metric('Latest Year', typeof y === 'object' ? y.latest : y) +
            metric('Year Range', typeof y === 'object' ? y.span + ' years' : y) + '</div>';
        },

        async about() {
          const d = await getJson('/api/about');
          viewEl.innerHTML = '<h2>About</h2><div class="card"><p>' + esc(d.text) + '</p>' +
            '<p>Source: ' + esc(d.source.label) + '</p>' +
            table(['field', 'available'], d.fields.map((f) => ({ field: f.field, available: f.available ? 'yes' : 'no' }))) + '</div>';
        },
      };

      async function show(page) {
        for (const btn of document.querySelectorAll('#nav button')) {
          btn.classList.toggle('active', btn.dataset.page === page);
        }
        try {
          await renderers[page]();
        } catch (e) {
          viewEl.innerHTML = notice({ level: 'error', message: e && e.message ? e.message : String(e) });
        }
      }

      async function refreshSource() {
        const info = await getJson('/api/dataset');
        sourceNoticeEl.innerHTML = notice(info.notice);
      }

      fileEl.addEventListener('change', async () => {
        const file = fileEl.files && fileEl.files[0];
        if (!file) return;
        try {
          const resp = await fetch('/api/dataset?name=' + encodeURIComponent(file.name), {
            method: 'POST',
            headers: { 'content-type': 'text/csv' },
            body: await file.text(),
          });
          const data = await resp.json();
          sourceNoticeEl.innerHTML = notice(resp.ok ? data.notice : { level: 'error', message: data.error });
          searchState.q = '';
          searchState.filters = {};
          show(document.querySelector('#nav button.active').dataset.page);
        } catch (e) {
          sourceNoticeEl.innerHTML = notice({ level: 'error', message: String(e) });
        }
      });

      for (const btn of document.querySelectorAll('#nav button')) {
        btn.addEventListener('click', () => show(btn.dataset.page));
      }

      refreshSource();
      show(PAGES[0]);
    </script>
  </body>
</html>`;
}
