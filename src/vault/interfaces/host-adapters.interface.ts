/**
 * Host-supplied adapters. The vault itself renders and reads no pixels and touches no clipboard;
 * a host wires these in through `VaultModule.forRoot()`.
 */

export const QR_CODEC = Symbol('QR_CODEC');
export const CLIPBOARD_SOURCE = Symbol('CLIPBOARD_SOURCE');

export interface QrCodec {
  /** Render text as a QR code image (PNG bytes) */
  imageFromText(text: string): Promise<Buffer>;
  /** Decode the first QR code in an image, or `null` when there is none */
  textFromImage(image: Buffer): Promise<string | null>;
}

export interface ClipboardSource {
  /** Current clipboard text, or `null` when it holds no text */
  readText(): Promise<string | null>;
}

export interface VaultModuleOptions {
  qrCodec?: QrCodec;
  clipboardSource?: ClipboardSource;
}
