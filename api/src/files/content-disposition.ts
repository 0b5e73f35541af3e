// 제어 문자 (C0, DEL, C1)
const CONTROL_CHARS = /[\u0000-\u001f\u007f-\u009f]/g;
const NON_ASCII = /[^ -~]/g;
const FALLBACK_FILENAME = 'download';

/**
 * 응답 헤더에 넣을 수 있는 파일명으로 정리한다.
 * 경로 구분자 앞부분과 제어 문자를 제거하고 큰따옴표는 작은따옴표로 바꾼다.
 */
export function sanitizeFilename(name: string): string {
  const withoutControls = name.replace(CONTROL_CHARS, '');
  const baseName = withoutControls.split(/[\\/]/).pop() ?? '';
  const cleaned = baseName.replace(/"/g, "'").trim();

  if (cleaned === '' || cleaned === '.' || cleaned === '..') {
    return FALLBACK_FILENAME;
  }
  return cleaned;
}

// RFC 5987 attr-char 외에는 모두 퍼센트 인코딩
function encodeRfc5987(value: string): string {
  return encodeURIComponent(value).replace(
    /['()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

export function buildAttachmentDisposition(filename: string): string {
  const safe = sanitizeFilename(filename);
  const asciiFallback = safe.replace(NON_ASCII, '_');

  if (asciiFallback === safe) {
    return `attachment; filename="${safe}"`;
  }
  return `attachment; filename="${asciiFallback}"; filename*=UTF-8''${encodeRfc5987(safe)}`;
}
