/**
 * Display Config
 *
 * Picks which fields a search-result card shows (title, description, image,
 * scalar badges, tag lists) from a profile and the index settings built for it.
 * Field references in the result use index attribute names.
 */

import type { DatasetProfile, RawFieldProfile } from '../types/profile.js';
import type { IndexSettings } from '../generator/index-settings-generator.js';
import { humanizeField, isIdLike, resolvePropertyNames } from '../generator/naming.js';

export interface DisplayConfig {
  primaryKey: string;
  titleField: string;
  descriptionField: string | null;
  imageField: string | null;
  scalarFields: string[];
  tagFields: string[];
  filterableFields: string[];
  labels: Record<string, string>;
  maxLen: number;
  maxList: number;
}

export type DisplaySettings = Partial<Pick<IndexSettings, 'searchableAttributes' | 'filterableAttributes'>>;

const TITLE_NAMES = ['title', 'original_title', 'name', 'label', 'heading'];
const DESCRIPTION_NAMES = ['description', 'overview', 'summary', 'abstract', 'notes'];
const TAG_NAMES = [
  'genres', 'genre',
  'tags', 'tag',
  'categories', 'category',
  'keywords', 'labels',
  'authors', 'powers', 'teams', 'species', 'partners'
];
const IMAGE_NAME_PARTS = ['image', 'thumb', 'poster', 'cover'];

const MAX_SCALAR_FIELDS = 3;
const MAX_TAG_FIELDS = 2;
const MIN_DESCRIPTION_LENGTH = 40;

function isStringTyped(field: RawFieldProfile): boolean {
  return field.types.includes('string');
}

/**
 * Every record holds the same single value
 */
function isDegenerate(field: RawFieldProfile): boolean {
  const values = Object.values(field.distribution?.values ?? {});
  return field.total > 0 && values.length === 1 && values[0] === field.total;
}

export function buildDisplayConfig(
  profile: DatasetProfile,
  settings: DisplaySettings = {},
  indexPrimaryKey?: string | null
): DisplayConfig {
  const fields = profile.fields;
  const profileFieldNames = Object.keys(fields);

  const toAttribute = resolvePropertyNames(profileFieldNames);
  const toProfileField = new Map<string, string>();
  for (const [name, attribute] of toAttribute) {
    toProfileField.set(attribute, name);
  }
  const attributeOf = (name: string): string => toAttribute.get(name) ?? name;
  const profileFieldOf = (attribute: string): RawFieldProfile | undefined => {
    const name = toProfileField.get(attribute);
    return name === undefined ? undefined : fields[name];
  };

  const primaryKey = indexPrimaryKey ?? (profile.pk === undefined ? 'id' : attributeOf(profile.pk));
  const filterable = (settings.filterableAttributes ?? []).filter(attribute => !isIdLike(attribute));

  // Title: a preferred name wins, otherwise the first string field
  let profileTitleField: string | null = null;
  for (const name of profileFieldNames) {
    if (!isStringTyped(fields[name])) {
      continue;
    }
    if (TITLE_NAMES.includes(name)) {
      profileTitleField = name;
      break;
    }
    profileTitleField ??= name;
  }

  let titleField = profileTitleField === null ? null : attributeOf(profileTitleField);
  if (titleField === null) {
    titleField = (settings.searchableAttributes ?? []).find(attribute => {
      const field = profileFieldOf(attribute);
      return field !== undefined && isStringTyped(field);
    }) ?? null;
  }

  let descriptionField: string | null = null;
  const namedDescription = DESCRIPTION_NAMES.find(name => Object.hasOwn(fields, name) && name !== profileTitleField);
  if (namedDescription !== undefined) {
    descriptionField = attributeOf(namedDescription);
  } else {
    const longText = profileFieldNames.find(name =>
      name !== profileTitleField &&
      isStringTyped(fields[name]) &&
      (fields[name].stringLengths?.max ?? 0) > MIN_DESCRIPTION_LENGTH
    );
    descriptionField = longText === undefined ? null : attributeOf(longText);
  }

  const scalarFields: string[] = [];
  for (const attribute of filterable) {
    const field = profileFieldOf(attribute);
    if (!field) {
      continue;
    }
    if (field.storageHint === 'int' || field.storageHint === 'float' || field.booleanLike) {
      scalarFields.push(attribute);
    }
    if (scalarFields.length >= MAX_SCALAR_FIELDS) {
      break;
    }
  }

  const tagFields: string[] = [];
  for (const attribute of filterable) {
    const field = profileFieldOf(attribute);
    if (!field || isDegenerate(field)) {
      continue;
    }
    const isArrayish = field.types.includes('array');
    const isStringFacet = isStringTyped(field) && field.facetCandidate;
    const isNameHint = TAG_NAMES.includes(attribute.toLowerCase());
    if (isArrayish || isStringFacet || isNameHint) {
      tagFields.push(attribute);
    }
    if (tagFields.length >= MAX_TAG_FIELDS) {
      break;
    }
  }

  const imageName = profileFieldNames.find(name => {
    const lower = name.toLowerCase();
    return IMAGE_NAME_PARTS.some(part => lower.includes(part)) && fields[name].storageHint === 'string';
  });

  const labels: Record<string, string> = {};
  for (const name of profileFieldNames) {
    const attribute = attributeOf(name);
    labels[attribute] = humanizeField(attribute);
  }

  return {
    primaryKey,
    titleField: titleField ?? primaryKey,
    descriptionField,
    imageField: imageName === undefined ? null : attributeOf(imageName),
    scalarFields,
    tagFields,
    filterableFields: filterable,
    labels,
    maxLen: 100,
    maxList: 3
  };
}
