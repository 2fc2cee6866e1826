import { Storage } from '@google-cloud/storage';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';

export interface ObjectStore {
  download(bucket: string, objectName: string, destination: string): Promise<void>;
  /** アップロード先の gs:// パスを返す */
  upload(bucket: string, source: string, objectName: string): Promise<string>;
}

export class GcsObjectStore implements ObjectStore {
  constructor(private readonly storage: Storage = new Storage()) {}

  async download(bucket: string, objectName: string, destination: string): Promise<void> {
    await fs.mkdir(path.dirname(destination), { recursive: true });
    await this.storage.bucket(bucket).file(objectName).download({ destination });
  }

  // 世代チェックなしで上書きする（同じ行の再実行は同名で上書き）
  async upload(bucket: string, source: string, objectName: string): Promise<string> {
    await this.storage.bucket(bucket).upload(source, { destination: objectName });
    console.log(`☁️ File ${source} uploaded to gs://${bucket}/${objectName}.`);
    return `gs://${bucket}/${objectName}`;
  }
}

/**
 * "bucket/path/to/video.mp4" -> { bucket, objectName }
 * 先頭の gs:// は付いていても良い
 */
export function splitVideoUrl(videoUrl: string): { bucket: string; objectName: string } {
  const trimmed = videoUrl.trim().replace(/^(?:gs|gcs):\/\//, '');
  const [bucket, ...rest] = trimmed.split('/');
  const objectName = rest.join('/');
  if (!bucket || !objectName) {
    throw new Error(`splitVideoUrl: invalid video_url: ${videoUrl}`);
  }
  return { bucket, objectName };
}

// "field", "field!s", "field:03d" の 1 個分
function formatField(body: string, values: Record<string, string | number>, template: string): string {
  const m = /^([^!:]*)(?:!([^:]*))?(?::(.*))?$/.exec(body);
  const field = m?.[1]?.trim() ?? '';
  if (!field) throw new Error(`Empty field in naming convention: ${template}`);
  const value = values[field];
  if (value === undefined) throw new Error(`Unknown field "${field}" in naming convention: ${template}`);

  const conversion = m?.[2];
  if (conversion !== undefined && conversion !== 's') {
    throw new Error(`Unsupported conversion "!${conversion}" in naming convention: ${template}`);
  }

  const spec = m?.[3] ?? '';
  if (!spec) return String(value);
  const width = /^(0?)(\d+)d$/.exec(spec);
  if (!width) throw new Error(`Unsupported format "${spec}" in naming convention: ${template}`);
  const n = typeof value === 'number' ? value : Number(String(value).trim());
  if (!Number.isInteger(n) || String(value).trim() === '') {
    throw new Error(`Field "${field}" is not an integer for format "${spec}" in naming convention: ${template}`);
  }
  const digits = String(Math.abs(n));
  const sign = n < 0 ? '-' : '';
  const size = Number(width[2]);
  return width[1] === '0'
    ? sign + digits.padStart(size - sign.length, '0')
    : (sign + digits).padStart(size, ' ');
}

/**
 * "{campaign_name}_{target_language}" のような名前付きプレースホルダを埋める。
 * "{{" / "}}" はそのまま波括弧になる。書式指定は整数の幅 ("3d" / "03d") と "!s" だけ受け付ける。
 */
export function formatTemplate(template: string, values: Record<string, string | number>): string {
  let out = '';
  let i = 0;
  while (i < template.length) {
    const ch = template.charAt(i);
    const next = template.charAt(i + 1);
    if (ch === '{' && next === '{') {
      out += '{';
      i += 2;
    } else if (ch === '}' && next === '}') {
      out += '}';
      i += 2;
    } else if (ch === '{') {
      const end = template.indexOf('}', i);
      if (end === -1) throw new Error(`Unmatched "{" in naming convention: ${template}`);
      out += formatField(template.slice(i + 1, end), values, template);
      i = end + 1;
    } else if (ch === '}') {
      throw new Error(`Single "}" in naming convention: ${template}`);
    } else {
      out += ch;
      i++;
    }
  }
  return out;
}

/** 命名規則で作った名前 + エンジン出力ファイルの拡張子 */
export function buildFileName(lineConfig: Record<string, string | number>, dubbedFile: string): string {
  const name = formatTemplate(String(lineConfig['output_naming_convention'] ?? ''), lineConfig);
  const ext = path.extname(dubbedFile);
  return `${name}${ext}`;
}
