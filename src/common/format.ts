const UNITS = ['B', 'KB', 'MB', 'GB'];

/** Binary units with one decimal: 1536 -> "1.5 KB". */
export function formatFileSize(bytes: number): string {
  let size = bytes;
  for (const unit of UNITS) {
    if (size < 1024) {
      return `${size.toFixed(1)} ${unit}`;
    }
    size /= 1024;
  }
  return `${size.toFixed(1)} TB`;
}
