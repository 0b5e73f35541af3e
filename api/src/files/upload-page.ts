import { RecentFileSummary } from './files.types';

export interface UploadPageView {
  files: RecentFileSummary[];
  errors?: string[];
  notice?: string;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

function renderFileItem(file: RecentFileSummary): string {
  const id = encodeURIComponent(file.id);
  return [
    '<li>',
    escapeHtml(file.name),
    ` <a href="/download/${id}">Download</a>`,
    ` <a href="/file/${id}">View</a>`,
    '</li>',
  ].join('');
}

export function renderUploadPage(view: UploadPageView): string {
  const notice = view.notice
    ? `<p class="notice">${escapeHtml(view.notice)}</p>`
    : '';
  const errors =
    view.errors && view.errors.length > 0
      ? `<ul class="errors">${view.errors
          .map((error) => `<li>${escapeHtml(error)}</li>`)
          .join('')}</ul>`
      : '';
  const files =
    view.files.length > 0
      ? `<ul class="files">${view.files.map(renderFileItem).join('')}</ul>`
      : '<p>No files uploaded yet.</p>';

  return `<!DOCTYPE html>
<html>
<head><meta charset="utf-8"><title>Upload File</title></head>
<body>
<h1>Upload File</h1>
${notice}
<form method="post" action="/upload" enctype="multipart/form-data">
${errors}
<input type="file" name="file">
<button type="submit">Upload</button>
</form>
<h2>Recent Files</h2>
${files}
</body>
</html>
`;
}
