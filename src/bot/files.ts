import { Telegram } from 'telegraf';

export type UploadKind = 'invoice' | 'logo' | 'unsupported';

export const XLSX_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export function classifyUpload(fileName: string, mimeType?: string): UploadKind {
  const name = fileName.toLowerCase();

  if (name.endsWith('.xlsx') || mimeType === XLSX_MIME_TYPE) {
    return 'invoice';
  }
  if (/\.(png|jpe?g)$/.test(name) || mimeType === 'image/png' || mimeType === 'image/jpeg') {
    return 'logo';
  }
  return 'unsupported';
}

export async function downloadFile(telegram: Telegram, fileId: string): Promise<Buffer> {
  const link = await telegram.getFileLink(fileId);
  const response = await fetch(link);
  if (!response.ok) {
    throw new Error(`Failed to download file ${fileId}: HTTP ${response.status}`);
  }
  return Buffer.from(await response.arrayBuffer());
}
