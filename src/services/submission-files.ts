import fs from 'fs';
import path from 'path';
import { fail, ok, type PaatshalaClient } from '../paatshala-client.js';
import type { Result, SubmissionFile } from '../types/paatshala.js';
import { DEFAULT_MAX_TEXT_LENGTH, MAX_FILE_SIZE, contentTypeFor, extractTextFromFile } from '../utils.js';

export interface DownloadedFile {
  path: string;
  size: number;
  /** True when an earlier download was reused */
  cached: boolean;
}

export interface SubmissionText {
  file: string;
  text: string;
  truncated: boolean;
  pages?: number;
}

/** File-system safe version of a student or file name */
export function safeName(name: string): string {
  const cleaned = name.replace(/[^\w.\- ]+/g, '_').replace(/\s+/g, '_').replace(/^\.+/, '');
  return cleaned || 'unnamed';
}

/**
 * Download a submission file into `<outputDir>/course_<id>/downloads/<student>/`.
 * A file already on disk is reused.
 */
export async function downloadSubmissionFile(
  client: PaatshalaClient,
  outputDir: string,
  courseId: string,
  student: string,
  file: SubmissionFile,
): Promise<Result<DownloadedFile>> {
  if (!file.url.includes('pluginfile.php')) {
    return fail('rejected', `Not a submission file URL: ${file.name}`);
  }

  const dir = path.join(outputDir, `course_${safeName(courseId)}`, 'downloads', safeName(student));
  const target = path.join(dir, safeName(file.name));
  if (fs.existsSync(target)) {
    return ok({ path: target, size: fs.statSync(target).size, cached: true });
  }

  const downloaded = await client.downloadFile(file.url);
  if (!downloaded.ok) return downloaded;
  if (downloaded.value.byteLength > MAX_FILE_SIZE) {
    return fail('rejected', `${file.name} is larger than ${MAX_FILE_SIZE / (1024 * 1024)} MB`);
  }

  try {
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(target, Buffer.from(downloaded.value));
  } catch (error) {
    return fail('network', `Could not save ${file.name}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return ok({ path: target, size: downloaded.value.byteLength, cached: false });
}

/**
 * Download (or reuse) a submission file and extract its text. PDFs go through
 * pdf-parse; text-like files are read as UTF-8; anything else is rejected.
 */
export async function readSubmissionText(
  client: PaatshalaClient,
  outputDir: string,
  courseId: string,
  student: string,
  file: SubmissionFile,
  maxLength = DEFAULT_MAX_TEXT_LENGTH,
): Promise<Result<SubmissionText>> {
  const downloaded = await downloadSubmissionFile(client, outputDir, courseId, student, file);
  if (!downloaded.ok) return downloaded;

  const contentType = contentTypeFor(file.name);
  let extracted: Awaited<ReturnType<typeof extractTextFromFile>>;
  try {
    extracted = await extractTextFromFile(fs.readFileSync(downloaded.value.path), contentType, maxLength);
  } catch (error) {
    return fail('parse', error instanceof Error ? error.message : String(error));
  }
  if (!extracted) {
    return fail('rejected', `Cannot extract text from ${file.name} (${contentType}); download it from ${downloaded.value.path} instead`);
  }
  return ok({ file: downloaded.value.path, ...extracted });
}
