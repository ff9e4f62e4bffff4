/**
 * Document codec used by the framer and the reply parser.
 *
 * The wire layer treats document bytes as opaque; anything that can turn a
 * document into bytes and read one back (reporting how many bytes it used)
 * can be plugged in. The default is BSON.
 */

import { BSON, type Document } from 'bson'

export interface DocumentCodec {
  encode(document: Document): Uint8Array
  /**
   * Decode one document starting at `offset`.
   * @returns the document and the number of bytes it occupied
   */
  decode(bytes: Uint8Array, offset: number): [Document, number]
}

/** Smallest legal BSON document: int32 length + terminating NUL */
const MIN_BSON_SIZE = 5

export const bsonCodec: DocumentCodec = {
  encode(document: Document): Uint8Array {
    return BSON.serialize(document)
  },

  decode(bytes: Uint8Array, offset: number): [Document, number] {
    if (offset + 4 > bytes.length) {
      throw new RangeError(`Need 4 bytes for document length at offset ${offset}, have ${bytes.length - offset}`)
    }
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
    const length = view.getInt32(offset, true)
    if (length < MIN_BSON_SIZE) {
      throw new RangeError(`Invalid document length ${length} at offset ${offset}`)
    }
    if (offset + length > bytes.length) {
      throw new RangeError(
        `Document at offset ${offset} declares ${length} bytes, only ${bytes.length - offset} remain`
      )
    }
    const document = BSON.deserialize(bytes.subarray(offset, offset + length))
    return [document, length]
  },
}
