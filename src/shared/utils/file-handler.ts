// File handling utilities
import { promises as fs } from 'fs';
import { basename } from 'path';
import { validateFileConstraints } from './validation';
import { config } from './environment';

export interface FileInfo {
  name: string;
  size: number;
}

export interface FileValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Validates an input spreadsheet against constraints
 */
export function validateUploadedFile(fileInfo: FileInfo): FileValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const constraintValidation = validateFileConstraints(
    { name: fileInfo.name, size: fileInfo.size },
    config.maxFileSize,
    config.allowedFileExtensions
  );

  if (!constraintValidation.isValid && constraintValidation.error) {
    errors.push(constraintValidation.error);
  }

  // Check for suspicious file names
  const suspiciousPatterns = [/[<>:"|?*]/, /^\./];
  if (suspiciousPatterns.some(pattern => pattern.test(basename(fileInfo.name)))) {
    warnings.push('File name contains potentially problematic characters');
  }

  // Size warnings
  if (fileInfo.size > config.maxFileSize * 0.8) {
    warnings.push('File is close to maximum size limit');
  }

  if (fileInfo.size === 0) {
    errors.push('File is empty');
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings
  };
}

/**
 * Escapes one CSV cell
 */
export function escapeCSVValue(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Creates CSV content from rows, in the given column order
 */
export function createCSVContent<C extends string>(rows: ReadonlyArray<Record<C, string>>, headers: readonly C[]): string {
  let csvContent = headers.map(escapeCSVValue).join(',') + '\n';

  rows.forEach(row => {
    csvContent += headers.map(header => escapeCSVValue(row[header])).join(',') + '\n';
  });

  return csvContent;
}

/**
 * Writes content to file safely
 */
export async function writeFileContent(filePath: string, content: string): Promise<void> {
  try {
    await fs.writeFile(filePath, content, 'utf8');
  } catch (error) {
    throw new Error(`Failed to write file ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`);
  }
}

/**
 * Reads file content safely
 */
export async function readFileContent(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new Error(`Failed to read file ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`);
  }
}

/**
 * Gets file stats safely
 */
export async function getFileStats(filePath: string): Promise<{ size: number; lastModified: Date } | null> {
  try {
    const stats = await fs.stat(filePath);
    return {
      size: stats.size,
      lastModified: stats.mtime
    };
  } catch {
    return null;
  }
}
