import { themes, themeVars, type ThemeName } from "./themes.js";
import { escapeHtml, formatPercent } from "../text/html.js";

export interface PairPage {
  leftTitle: string;
  rightTitle: string;
  leftHtml: string;
  rightHtml: string;
  overlap: number;
}

export function generatePairHtml(page: PairPage, theme: ThemeName = "dark"): string {
  const title = `${page.leftTitle} ↔ ${page.rightTitle}`;
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>Overlap: ${escapeHtml(title)}</title>
<style>
  :root {
    ${themeVars(themes[theme])}
  }
${BASE_CSS}
${PAIR_CSS}
</style>
</head>
<body>
  <header>
    <div class="header-cell left-header">${escapeHtml(page.leftTitle)}</div>
    <div class="header-cell overlap">${formatPercent(page.overlap)}</div>
    <div class="header-cell right-header">${escapeHtml(page.rightTitle)}</div>
  </header>
  <div class="diff-container">
    <div class="diff-pane left-pane" id="leftPane">${page.leftHtml}</div>
    <div class="diff-pane right-pane" id="rightPane">${page.rightHtml}</div>
  </div>
  <script>
${SCROLL_SYNC_SCRIPT}
  </script>
</body>
</html>
`;
}

export function generateSummaryHtml(tableHtml: string, title: string, theme: ThemeName = "dark"): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${escapeHtml(title)}</title>
<style>
  :root {
    ${themeVars(themes[theme])}
  }
${BASE_CSS}
${SUMMARY_CSS}
</style>
</head>
<body>
  <header>
    <div class="header-cell">${escapeHtml(title)}</div>
  </header>
  <main class="summary">
${tableHtml}
  </main>
</body>
</html>
`;
}

const BASE_CSS = `
  * { margin: 0; padding: 0; box-sizing: border-box; }

  body {
    font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
    background: var(--do-bg);
    color: var(--do-text);
    display: flex;
    flex-direction: column;
    height: 100vh;
  }

  header {
    display: flex;
    border-bottom: 2px solid var(--do-border);
    background: var(--do-bg-alt);
    flex-shrink: 0;
  }

  .header-cell {
    flex: 1;
    padding: 10px 20px;
    font-weight: 600;
    font-size: 13px;
    letter-spacing: 0.5px;
    text-transform: uppercase;
    color: var(--do-text-muted);
    overflow: hidden;
    text-overflow: ellipsis;
    white-space: nowrap;
  }

  a { color: var(--do-link); text-decoration: none; }
  a:hover { text-decoration: underline; }
`;

const PAIR_CSS = `
  .header-cell.overlap { flex: 0 0 auto; color: var(--do-matched-text); }
  .left-header { border-right: 1px solid var(--do-border); }

  .diff-container {
    display: flex;
    flex: 1;
    overflow: hidden;
  }

  .diff-pane {
    flex: 1;
    overflow-y: auto;
    padding: 16px 24px;
    line-height: 1.7;
  }

  .left-pane { border-right: 1px solid var(--do-border); }

  .chunk { border-radius: 2px; padding: 0 1px; }
  .chunk.matched {
    background: var(--do-matched-bg);
    color: var(--do-matched-text);
    border-bottom: 1px solid var(--do-matched-border);
  }
  .chunk.unmatched {
    background: var(--do-unmatched-bg);
    color: var(--do-unmatched-text);
  }

  .diff-pane::-webkit-scrollbar { width: 8px; }
  .diff-pane::-webkit-scrollbar-track { background: var(--do-scroll-track); }
  .diff-pane::-webkit-scrollbar-thumb { background: var(--do-scroll-thumb); border-radius: 4px; }
  .diff-pane::-webkit-scrollbar-thumb:hover { background: var(--do-scroll-thumb-hover); }
`;

const SUMMARY_CSS = `
  .summary { padding: 16px 24px; overflow: auto; }

  table.results { border-collapse: collapse; font-size: 13px; }
  table.results th, table.results td {
    border: 1px solid var(--do-border);
    padding: 6px 10px;
    text-align: center;
    white-space: nowrap;
  }
  table.results th { background: var(--do-bg-alt); color: var(--do-text-muted); }
  table.results td.self { background: var(--do-self-cell-bg); color: var(--do-text-muted); }
  table.results td.high { background: var(--do-score-high-bg); }
  table.results td.mid { background: var(--do-score-mid-bg); }
  table.results td.low { background: var(--do-score-low-bg); }
`;

const SCROLL_SYNC_SCRIPT = `
(function() {
  const left = document.getElementById('leftPane');
  const right = document.getElementById('rightPane');
  let syncing = false;

  function syncScroll(source, target) {
    if (syncing) return;
    syncing = true;
    const ratio = source.scrollTop / (source.scrollHeight - source.clientHeight || 1);
    target.scrollTop = ratio * (target.scrollHeight - target.clientHeight);
    syncing = false;
  }

  left.addEventListener('scroll', () => syncScroll(left, right));
  right.addEventListener('scroll', () => syncScroll(right, left));
})();
`;
