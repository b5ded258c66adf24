/**
 * Static browser page for the web interface. Everything it shows comes from
 * /api/tree and /api/file.
 */

const STYLES = `
  body { font-family: ui-monospace, SFMono-Regular, Menlo, monospace; margin: 0; display: flex; height: 100vh; }
  #tree { width: 30%; overflow: auto; border-right: 1px solid #ccc; padding: 8px; }
  #view { flex: 1; overflow: auto; padding: 8px; }
  .node { cursor: pointer; white-space: pre; }
  .added { color: #1a7f37; }
  .removed { color: #cf222e; }
  .modified { color: #9a6700; }
  .conflicted { color: #8250df; }
  .unchanged { color: #57606a; }
  table { border-collapse: collapse; width: 100%; }
  td { vertical-align: top; white-space: pre-wrap; padding: 0 6px; }
  td.num { color: #8c959f; text-align: right; width: 3em; }
  tr.delete td.left, tr.replace td.left { background: #ffebe9; }
  tr.insert td.right, tr.replace td.right { background: #dafbe1; }
  .error { color: #cf222e; }
`;

const SCRIPT = `
  const icons = { added: "+", removed: "-", modified: "~", unchanged: " ", conflicted: "!" };

  function escapeHtml(text) {
    return text.replace(/[&<>"]/g, (c) => ({ "&": "&amp;", "<": "&lt;", ">": "&gt;", '"': "&quot;" })[c]);
  }

  function renderNode(node, depth, container) {
    const line = document.createElement("div");
    line.className = "node " + node.status;
    const suffix = node.kind === "directory" ? "/" : "";
    line.textContent = "  ".repeat(depth) + icons[node.status] + " " + node.name + suffix;
    if (node.kind === "file") {
      line.addEventListener("click", () => showFile(node.relativePath));
    }
    container.appendChild(line);
    for (const child of node.children) renderNode(child, depth + 1, container);
  }

  async function showFile(path) {
    const view = document.getElementById("view");
    const response = await fetch("/api/file?path=" + encodeURIComponent(path));
    const body = await response.json();
    if (!body.success) {
      view.innerHTML = '<p class="error">' + escapeHtml(body.error) + "</p>";
      return;
    }
    const rows = [];
    for (const hunk of body.data.hunks) {
      const count = Math.max(hunk.leftLines.length, hunk.rightLines.length);
      for (let i = 0; i < count; i++) {
        const left = hunk.leftLines[i];
        const right = hunk.rightLines[i];
        rows.push(
          '<tr class="' + hunk.operation + '">' +
            '<td class="num">' + (left !== undefined ? hunk.leftRange.start + i : "") + "</td>" +
            '<td class="left">' + (left !== undefined ? escapeHtml(left) : "") + "</td>" +
            '<td class="num">' + (right !== undefined ? hunk.rightRange.start + i : "") + "</td>" +
            '<td class="right">' + (right !== undefined ? escapeHtml(right) : "") + "</td>" +
          "</tr>"
        );
      }
    }
    const stats = body.data.stats;
    view.innerHTML =
      "<h3>" + escapeHtml(path) + " <small>+" + stats.additions + " -" + stats.deletions + "</small></h3>" +
      "<table>" + rows.join("") + "</table>";
  }

  async function main() {
    const response = await fetch("/api/tree");
    const body = await response.json();
    const container = document.getElementById("tree");
    renderNode(body.data.root, 0, container);
  }

  main();
`;

/**
 * HTML document served at GET /.
 */
export function renderPage(): string {
  return [
    "<!doctype html>",
    '<html lang="en">',
    "<head>",
    '<meta charset="utf-8">',
    "<title>diffy</title>",
    `<style>${STYLES}</style>`,
    "</head>",
    "<body>",
    '<div id="tree"></div>',
    '<div id="view"><p>Select a file to see its diff.</p></div>',
    `<script>${SCRIPT}</script>`,
    "</body>",
    "</html>",
  ].join("\n");
}
