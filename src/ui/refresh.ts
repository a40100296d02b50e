import { dirname } from 'node:path';
import type { RefreshPolicy } from '../store/settings.model.js';
import type { FileInfo } from '../tree/file-info.js';

export function describeRefresh(policy: RefreshPolicy, item: FileInfo): string {
  switch (policy) {
    case 'none':
      return 'Nothing to rescan.';
    case 'refresh-this':
      return `Rescan ${item.path} to see the new sizes.`;
    case 'refresh-parent':
      return `Rescan ${dirname(item.path)} to see the new sizes.`;
    case 'assume-deleted':
      return `${item.path} is gone.`;
  }
}
