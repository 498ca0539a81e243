/**
 * formEncoding.ts: Request bodies shaped like browser form submissions.
 */

import type { FormFields, MultipartFields } from '../core/types';

export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

/**
 * URL-encode `fields`.  Array values become repeated keys, which is how PHP
 * receives `agents[]` checkboxes.
 */
export function encodeForm(fields: FormFields): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(fields)) {
    if (typeof value === 'string') {
      params.append(key, value);
    } else {
      for (const item of value) params.append(key, item);
    }
  }
  return params.toString();
}

/** Build a multipart body, keeping field order as given. */
export function buildMultipartBody(fields: MultipartFields): FormData {
  const form = new FormData();
  for (const [name, value] of fields) {
    if (typeof value === 'string') {
      form.append(name, value);
    } else {
      form.append(name, new Blob([value.content], { type: value.contentType }), value.filename);
    }
  }
  return form;
}
