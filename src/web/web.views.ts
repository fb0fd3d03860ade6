import type { ChatEntry, DestinationResponse, Flash, NoteResponse } from './web.models';

type Section = 'destinations' | 'notes' | 'ask';

const NAV: { section: Section; href: string; label: string }[] = [
  { section: 'destinations', href: '/app/destinations', label: '🏠 Destinations' },
  { section: 'notes', href: '/app/notes', label: '📚 Knowledge Base' },
  { section: 'ask', href: '/app/ask', label: '✨ Ask AI' },
];

const STYLE = `
body { font-family: system-ui, sans-serif; margin: 0; display: flex; min-height: 100vh; }
nav { width: 14rem; background: #f0f2f6; padding: 1.5rem 1rem; }
nav a { display: block; padding: .5rem; color: #2c3e50; text-decoration: none; border-radius: 6px; }
nav a.active { background: #3498db; color: #fff; }
main { flex: 1; padding: 1.5rem 2.5rem; max-width: 60rem; }
h1 { color: #1f77b4; }
h2 { color: #2c3e50; border-bottom: 2px solid #3498db; padding-bottom: .5rem; }
.flash { padding: .75rem 1rem; border-radius: 6px; margin-bottom: 1rem; }
.flash.success { background: #d4edda; } .flash.error { background: #f8d7da; } .flash.info { background: #d1ecf1; }
.card { background: #f8f9fa; padding: 1rem; border-radius: 8px; border-left: 4px solid #3498db; margin-bottom: 1rem; display: flex; justify-content: space-between; }
.note { background: #fff3cd; border-left-color: #ffc107; display: block; }
.msg { padding: .75rem 1rem; margin: .5rem 0; border-radius: 18px; }
.msg.user { background: #007bff; color: #fff; margin-left: 20%; }
.msg.ai { background: #e9ecef; margin-right: 20%; }
.time { font-size: .75rem; opacity: .7; }
.weather { background: #e2e3e5; padding: .5rem; border-radius: 4px; margin-top: .5rem; font-style: italic; }
button { background: #3498db; color: #fff; border: none; border-radius: 6px; padding: .5rem 1rem; cursor: pointer; }
`;

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function formatDate(iso: string): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) return iso;
  return date.toLocaleString('en-US', {
    month: 'long',
    day: '2-digit',
    year: 'numeric',
    hour: '2-digit',
    minute: '2-digit',
  });
}

function flashes(items: Flash[]): string {
  return items
    .map((f) => `<div class="flash ${f.kind}">${escapeHtml(f.text)}</div>`)
    .join('\n');
}

export function layout(section: Section, title: string, notices: Flash[], body: string): string {
  const nav = NAV.map(
    (n) =>
      `<a href="${n.href}"${n.section === section ? ' class="active"' : ''}>${n.label}</a>`,
  ).join('\n');

  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${escapeHtml(title)} · AI Travel Advisor</title>
<style>${STYLE}</style>
</head>
<body>
<nav><strong>Navigation</strong>
${nav}
</nav>
<main>
<h1>✈️ AI Travel Advisor</h1>
<h2>${escapeHtml(title)}</h2>
${flashes(notices)}
${body}
</main>
</body>
</html>`;
}

function destinationSelect(
  action: string,
  destinations: DestinationResponse[],
  selected: number,
): string {
  const options = destinations
    .map(
      (d) =>
        `<option value="${d.id}"${d.id === selected ? ' selected' : ''}>${escapeHtml(d.name)}</option>`,
    )
    .join('');
  return `<form method="get" action="${action}">
<select name="destination" onchange="this.form.submit()">${options}</select>
<noscript><button type="submit">Select</button></noscript>
</form>`;
}

export function destinationsPage(notices: Flash[], destinations: DestinationResponse[]): string {
  const list =
    destinations.length === 0
      ? '<p>No destinations yet. Add your first destination above!</p>'
      : destinations
          .map(
            (d) => `<div class="card">
<div><strong>${escapeHtml(d.name)}</strong><br><small>Added: ${escapeHtml(formatDate(d.created_at))}</small></div>
<form method="post" action="/app/destinations/${d.id}/delete"><button type="submit" title="Delete destination">❌</button></form>
</div>`,
          )
          .join('\n');

  return layout(
    'destinations',
    'Destinations',
    notices,
    `<h3>Add New Destination</h3>
<form method="post" action="/app/destinations">
<input name="name" maxlength="255" placeholder="e.g. Paris, Tokyo, New York" required>
<button type="submit">Add Destination</button>
</form>
<h3>Your Destinations</h3>
${list}`,
  );
}

export function notesPage(
  notices: Flash[],
  destinations: DestinationResponse[],
  selected: DestinationResponse | null,
  notes: NoteResponse[],
): string {
  if (!selected) {
    return layout(
      'notes',
      'Knowledge Base',
      [...notices, { kind: 'info', text: 'No destinations available. Please add destinations first!' }],
      '',
    );
  }

  const list =
    notes.length === 0
      ? `<p>No notes for ${escapeHtml(selected.name)} yet.</p>`
      : notes
          .map(
            (n) => `<div class="card note">${escapeHtml(n.content)}<br><small>Added: ${escapeHtml(formatDate(n.created_at))}</small></div>`,
          )
          .join('\n');

  return layout(
    'notes',
    'Knowledge Base',
    notices,
    `<h3>Select Destination</h3>
${destinationSelect('/app/notes', destinations, selected.id)}
<h3>Add Note</h3>
<form method="post" action="/app/notes">
<input type="hidden" name="destination" value="${selected.id}">
<textarea name="content" rows="4" cols="60" placeholder="Share tips, opening hours, local knowledge..." required></textarea><br>
<button type="submit">Add Note</button>
</form>
<h3>Notes for ${escapeHtml(selected.name)}</h3>
${list}`,
  );
}

function chatMessage(entry: ChatEntry): string {
  const weather = entry.weather
    ? `<div class="weather">🌤️ ${escapeHtml(entry.weather)}</div>`
    : '';
  return `<div class="msg ${entry.isUser ? 'user' : 'ai'}">${escapeHtml(entry.text)}${weather}<div class="time">${escapeHtml(entry.timestamp)}</div></div>`;
}

export function askPage(
  notices: Flash[],
  destinations: DestinationResponse[],
  selected: DestinationResponse | null,
  transcript: ChatEntry[],
): string {
  if (!selected) {
    return layout(
      'ask',
      'Ask AI',
      [...notices, { kind: 'info', text: 'No destinations available. Please add destinations first!' }],
      '',
    );
  }

  const chat =
    transcript.length === 0
      ? `<p>Ask anything about ${escapeHtml(selected.name)}: sights, opening hours, the weather...</p>`
      : transcript.map(chatMessage).join('\n');

  return layout(
    'ask',
    'Ask AI',
    notices,
    `${destinationSelect('/app/ask', destinations, selected.id)}
<section class="chat">
${chat}
</section>
<form method="post" action="/app/ask">
<input type="hidden" name="destination" value="${selected.id}">
<input name="question" size="60" placeholder="Ask about ${escapeHtml(selected.name)}..." required>
<button type="submit">Send</button>
</form>
<form method="post" action="/app/ask/clear">
<input type="hidden" name="destination" value="${selected.id}">
<button type="submit">Clear chat</button>
</form>`,
  );
}
