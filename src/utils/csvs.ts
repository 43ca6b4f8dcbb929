export interface CSVRow {
  /** 1-based record number in the file, blank records included */
  rowNumber: number;
  cells: string[];
}

/**
 * Parse CSV content into records of raw cells
 * Handles quoted fields, escaped quotes, CRLF, and newlines within fields
 */
export function parseCSV(content: string): CSVRow[] {
  const rows: CSVRow[] = [];
  let currentRow: string[] = [];
  let currentField = '';
  let insideQuotes = false;
  let recordNumber = 1;
  let i = 0;

  const endRecord = () => {
    currentRow.push(currentField);
    if (currentRow.some(f => f.trim())) {
      rows.push({ rowNumber: recordNumber, cells: currentRow });
    }
    recordNumber++;
    currentRow = [];
    currentField = '';
  };

  while (i < content.length) {
    const char = content[i];
    const nextChar = content[i + 1];

    if (char === '"') {
      if (insideQuotes && nextChar === '"') {
        // Escaped quote
        currentField += '"';
        i += 2;
        continue;
      }
      insideQuotes = !insideQuotes;
      i++;
      continue;
    }

    if (!insideQuotes && char === ',') {
      currentRow.push(currentField);
      currentField = '';
      i++;
      continue;
    }

    if (!insideQuotes && char === '\r' && nextChar === '\n') {
      i++;
      continue;
    }

    if (!insideQuotes && char === '\n') {
      endRecord();
      i++;
      continue;
    }

    currentField += char;
    i++;
  }

  // Last record without trailing newline
  if (currentField || currentRow.length > 0) {
    endRecord();
  }

  return rows;
}
