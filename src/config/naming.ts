export const NAME_TAG_KEY = 'Name';

/** Name tag values the topology gives its fixed resources */
export const ResourceNames = {
  publicSubnet: 'PublicSubnet',
  privateSubnet: 'PrivateSubnet',
  publicRouteTable: 'PublicRouteTable',
  privateRouteTable: 'PrivateRouteTable'
} as const;

const MAX_TAG_VALUE_LENGTH = 256;

export interface ResourceTag {
  key: string;
  value: string;
}

export function gatewayName(vpcName: string): string {
  return truncate(`${vpcName}-igw`, MAX_TAG_VALUE_LENGTH);
}

/**
 * Build the ordered tag list for one resource: the Name tag first, then any
 * extra tags. An extra `Name` entry is ignored.
 */
export function resourceTags(name: string, extra: Readonly<Record<string, string>> = {}): ResourceTag[] {
  const tags: ResourceTag[] = [{ key: NAME_TAG_KEY, value: name }];

  for (const [key, value] of Object.entries(extra)) {
    if (key === NAME_TAG_KEY) {
      continue;
    }
    tags.push({ key, value });
  }

  return tags;
}

function truncate(value: string, maxLength: number): string {
  return value.length > maxLength ? value.substring(0, maxLength) : value;
}
