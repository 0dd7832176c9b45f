// packages/node-runtime/src/tags/embedCover.ts
import taglib from 'node-taglib-sharp';
import type { File as TagFile } from 'node-taglib-sharp';
import { FormatError, IOError } from '../../../core/src/errors/index.js';
import { describeFsError } from '../FileByteSource.js';

/** Output formats whose tags can carry a picture, by taglib MIME type. */
const TAGGABLE = new Map<string, string>([
  ['flac', 'taglib/flac'],   // METADATA_BLOCK_PICTURE
  ['mp3',  'taglib/mp3'],    // ID3v2 APIC
]);

export function canEmbedCover(format: string): boolean {
  return TAGGABLE.has(format.toLowerCase());
}

/**
 * Replace every picture in the file's tags with `cover` as the front cover.
 * The path may carry any extension; the tag layout follows `format`.
 *
 * @throws {FormatError} for formats without picture tags or unreadable tags
 * @throws {IOError} when the tags cannot be written back
 */
export function embedCover(path: string, format: string, cover: Uint8Array): void {
  const key  = format.toLowerCase();
  const mime = TAGGABLE.get(key);
  if (!mime) throw new FormatError(`Cannot embed a cover into .${format} files`);

  let file: TagFile;
  try {
    file = taglib.File.createFromPath(path, mime, taglib.ReadStyle.None);
  } catch (err) {
    throw new FormatError(`Cannot read tags of ${path}: ${describeFsError(err)}`);
  }

  try {
    if (key === 'mp3') file.getTag(taglib.TagTypes.Id3v2, true);

    const picture = taglib.Picture.fromData(taglib.ByteVector.fromByteArray(cover));
    picture.type        = taglib.PictureType.FrontCover;
    picture.description = 'Front Cover';
    file.tag.pictures   = [picture];

    file.save();
  } catch (err) {
    throw new IOError(`Cannot write cover into ${path}: ${describeFsError(err)}`);
  } finally {
    file.dispose();
  }
}
