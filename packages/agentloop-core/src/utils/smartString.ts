const BYTE_PREVIEW_LIMIT = 20;

export function toSmartString(value: unknown): string {
  if (value === null || value === undefined) {
    return String(value);
  }

  if (value instanceof ArrayBuffer) {
    return formatByteArray(new Uint8Array(value));
  }

  if (ArrayBuffer.isView(value)) {
    return formatByteArray(
      new Uint8Array(value.buffer, value.byteOffset, value.byteLength),
    );
  }

  if (typeof value === 'string') {
    return value;
  }

  if (typeof value === 'object') {
    try {
      return JSON.stringify(value, smartStringReplacer);
    } catch (_e) {
      return '[object with circular references]';
    }
  }

  return String(value);
}

export function isSerializedBufferSnapshot(
  value: unknown,
): value is { type: 'Buffer'; data: number[] } {
  // JSON.stringify(Buffer) produces this shape before the replacer sees it.
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    value.type === 'Buffer' &&
    'data' in value &&
    Array.isArray(value.data)
  );
}

function formatByteArray(bytes: Uint8Array): string {
  if (bytes.length === 0) {
    return '[byte array (0 bytes)]';
  }

  const previewLength = Math.min(bytes.length, BYTE_PREVIEW_LIMIT);
  const previewParts: string[] = [];

  for (let i = 0; i < previewLength; i++) {
    previewParts.push(formatByte(bytes[i]));
  }

  const ellipsis = bytes.length > BYTE_PREVIEW_LIMIT ? ' ...' : '';
  const preview = previewParts.join(' ');

  return `[byte array ${preview}${ellipsis} (${bytes.length} bytes)]`;
}

function formatByte(byte: number): string {
  return `0x${byte.toString(16).padStart(2, '0')}`;
}

function smartStringReplacer(_key: string, nestedValue: unknown): unknown {
  if (nestedValue instanceof ArrayBuffer) {
    return formatByteArray(new Uint8Array(nestedValue));
  }

  if (ArrayBuffer.isView(nestedValue)) {
    return formatByteArray(
      new Uint8Array(
        nestedValue.buffer,
        nestedValue.byteOffset,
        nestedValue.byteLength,
      ),
    );
  }

  if (isSerializedBufferSnapshot(nestedValue)) {
    return formatByteArray(Uint8Array.from(nestedValue.data));
  }

  return nestedValue;
}
