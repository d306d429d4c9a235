import { z } from 'zod';

const base64 = z.string().regex(/^[A-Za-z0-9+/]*={0,2}$/, 'must be base64');

/**
 * Schema for an AES-256-GCM envelope
 */
export const EncryptedBlobSchema = z.object({
  version: z.literal(1),
  salt: base64.describe('Key-derivation salt of the key that sealed the blob'),
  iv: base64.describe('12-byte GCM nonce'),
  ciphertext: base64,
  tag: base64.describe('16-byte GCM authentication tag'),
});

export type EncryptedBlob = z.infer<typeof EncryptedBlobSchema>;

/**
 * Schema for the note fields sealed together inside a blob
 */
export const NoteContentSchema = z.object({
  title: z.string(),
  body: z.string(),
  tags: z.array(z.string()),
});

const documentBase = {
  version: z.literal(1),
  id: z.string().min(1),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
};

/**
 * Schema for the JSON file a note is stored as on the remote. Encrypted notes
 * never leave the machine in plaintext.
 */
export const RemoteNoteDocumentSchema = z.discriminatedUnion('encrypted', [
  z.object({
    ...documentBase,
    encrypted: z.literal(false),
    title: z.string(),
    body: z.string(),
    tags: z.array(z.string()),
  }),
  z.object({
    ...documentBase,
    encrypted: z.literal(true),
    payload: EncryptedBlobSchema,
  }),
]);

export type RemoteNoteDocument = z.infer<typeof RemoteNoteDocumentSchema>;
