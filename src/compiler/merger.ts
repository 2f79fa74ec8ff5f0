/**
 * Proxy Sheets – Override Merger
 *
 * PURPOSE:
 *   Reconciles the source dataset with the override files into the primary manifest and the
 *   separate local overlay. The passes run strictly in this order:
 *
 *     1. additions and edits     ([[card]] entries, declaration order, last declared wins per field)
 *     2. expansion               (faces and variants become one printing each)
 *     3. remap resolution        ([[nrdb_remap]], single hop, table checked before any rewrite)
 *     4. uniqueness              (printing ids and codes each have exactly one owner)
 *     5. local overlay           (same passes on local-only entries, never touching the primary set)
 *     6. local images            ([[local_image]] from both files, resolved into the overlay)
 *
 * CONTEXT:
 *   - Any conflict aborts the whole run. Nothing is written unless every pass succeeds.
 *   - Amending a dataset card, or a card an earlier entry already amended, logs a warning
 *     naming the fields that changed.
 */

import {
  makeTitle,
  sameShape,
  shapeOf,
  stripNonAscii,
  printingId,
  printingOrdinal,
  type Card,
} from '../models/Card';
import { MANIFEST_VERSION, type Manifest, type Remap } from '../models/Manifest';
import {
  DEFAULT_PRINTING_NAME,
  entriesOfKind,
  type CardEntry,
  type OverrideFile,
  type RemapEntry,
} from '../models/Override';
import { LoadError, MergeConflictError } from '../utils/errors';
import { logInfo, logWarn } from '../utils/fileHelpers';
import { expandCard } from './expand';
import { resolveLocalImages, type GroupedPrinting } from './localImages';
import type { SourceData } from './sourceLoader';
import { draftKey, type DraftCard } from './types';

const TAG = 'merger';

export interface MergeInput {
  source: SourceData;
  primary: OverrideFile;
  local?: OverrideFile;
}

export interface MergeResult {
  primary: Manifest;
  /** Null when neither file declares any local-only entry. */
  overlay: Manifest | null;
}

function cloneDraft(draft: DraftCard): DraftCard {
  return {
    ...draft,
    printings: draft.printings.map((printing) => ({ ...printing })),
  };
}

function createDraft(entry: CardEntry, file: string): DraftCard {
  if (entry.title === undefined) {
    throw new LoadError(`new card ${entry.id} in ${file} has no \`title\``, { ids: [entry.id] });
  }
  if (entry.printings.length === 0) {
    throw new LoadError(`new card ${entry.id} in ${file} needs \`printing_id\` or \`printings\``, {
      ids: [entry.id],
    });
  }
  const draft: DraftCard = {
    id: entry.id,
    group: entry.group,
    ...makeTitle(entry.title, entry.strippedTitle),
    shape: entry.shape ?? { kind: 'single' },
    printings: [],
    origin: 'override',
    amendments: 0,
  };
  addPrintings(draft, entry);
  return draft;
}

/** Adds the entry's printings; a code the card already has is renamed when a name is given. */
function addPrintings(draft: DraftCard, entry: CardEntry): void {
  for (const declared of entry.printings) {
    const name = declared.name ?? entry.printingName;
    const existing = draft.printings.find((printing) => printing.code === declared.code);
    if (existing) {
      if (name !== undefined) existing.name = name;
    } else {
      draft.printings.push({ code: declared.code, name: name ?? DEFAULT_PRINTING_NAME });
    }
  }
}

function amendDraft(draft: DraftCard, entry: CardEntry, file: string): void {
  const changed: string[] = [];
  if (entry.title !== undefined) {
    draft.title = entry.title;
    draft.strippedTitle = entry.strippedTitle ?? stripNonAscii(entry.title);
    changed.push('title');
  } else if (entry.strippedTitle !== undefined) {
    draft.strippedTitle = entry.strippedTitle;
    changed.push('stripped_title');
  }
  if (entry.shape !== undefined) {
    draft.shape = entry.shape;
    changed.push('shape');
  }
  if (entry.printings.length > 0) {
    addPrintings(draft, entry);
    changed.push('printings');
  }

  const owner = draft.origin === 'dataset' && draft.amendments === 0 ? 'the dataset' : 'an earlier override';
  logWarn(
    TAG,
    `OVERRIDE: card ${draftKey(draft.group, draft.id)} from ${owner} amended by ${file} ` +
      `(${changed.length > 0 ? changed.join(', ') : 'no fields'}); last declared wins`
  );
  draft.amendments++;
}

function requireGroup(groups: ReadonlySet<string>, entry: CardEntry, file: string): void {
  if (!groups.has(entry.group)) {
    throw new MergeConflictError(
      `card ${entry.id} in ${file} names group ${entry.group}, which no [[collection]] declares`,
      { ids: [entry.id, entry.group] }
    );
  }
}

function validateRemapTable(remaps: ReadonlyArray<RemapEntry>, file: string): void {
  const froms = new Set<number>();
  for (const remap of remaps) {
    if (remap.from === remap.to) {
      throw new MergeConflictError(`remap in ${file} maps ${remap.from} onto itself`, { ids: [remap.from] });
    }
    if (froms.has(remap.from)) {
      throw new MergeConflictError(`remap source ${remap.from} is declared more than once in ${file}`, {
        ids: [remap.from],
      });
    }
    froms.add(remap.from);
  }
  for (const remap of remaps) {
    if (froms.has(remap.to)) {
      throw new MergeConflictError(
        `remap ${remap.from} -> ${remap.to} forms a chain; ${remap.to} is itself remapped`,
        { ids: [remap.from, remap.to] }
      );
    }
  }
}

/**
 * Rewrites every record carrying `remap.from` to `remap.to`. An existing `to` record is a
 * conflict unless the remap sets `supersede`, in which case it is discarded.
 */
export function applyRemap(cards: ReadonlyArray<Card>, remap: RemapEntry): Card[] {
  const fromId = String(remap.from);
  const toId = String(remap.to);
  const carriesFrom = (card: Card) =>
    card.id === fromId || card.printings.some((printing) => printing.code === remap.from);

  const fromCards = cards.filter(carriesFrom);
  if (fromCards.length === 0) {
    throw new MergeConflictError(`remap ${remap.from} -> ${remap.to} is unresolved: nothing carries ${remap.from}`, {
      ids: [remap.from, remap.to],
    });
  }
  const fromGroups = new Set(fromCards.map((card) => card.group));
  const isTargetCard = (card: Card) => card.id === toId && fromGroups.has(card.group) && !carriesFrom(card);

  const clashes = cards
    .filter((card) => isTargetCard(card) || card.printings.some((printing) => printing.code === remap.to))
    .map((card) => draftKey(card.group, card.id));
  if (clashes.length > 0) {
    if (!remap.supersede) {
      throw new MergeConflictError(
        `remap ${remap.from} -> ${remap.to} targets existing records (${clashes.join(', ')}); ` +
          'set `supersede = true` to replace them',
        { ids: [remap.from, remap.to] }
      );
    }
    logWarn(TAG, `OVERRIDE: remap ${remap.from} -> ${remap.to} supersedes ${clashes.join(', ')}`);
  }

  const result: Card[] = [];
  for (const card of cards) {
    if (isTargetCard(card)) continue;
    const printings = card.printings
      .filter((printing) => printing.code !== remap.to)
      .map((printing) =>
        printing.code === remap.from
          ? { ...printing, code: remap.to, id: printingId(remap.to, printingOrdinal(printing)) }
          : printing
      );
    if (printings.length === 0) continue;
    result.push({ ...card, id: card.id === fromId ? toId : card.id, printings });
  }
  return result;
}

function applyRemaps(cards: Card[], remaps: ReadonlyArray<RemapEntry>, file: string): Card[] {
  validateRemapTable(remaps, file);
  return remaps.reduce<Card[]>((current, remap) => applyRemap(current, remap), cards);
}

/** Asserts unique card keys, printing ids and code ownership. Returns code → owning card key. */
function assertUnique(cards: ReadonlyArray<Card>, scope: string): Map<number, string> {
  const cardKeys = new Set<string>();
  const printingOwners = new Map<string, string>();
  const codeOwners = new Map<number, string>();

  for (const card of cards) {
    const key = draftKey(card.group, card.id);
    if (cardKeys.has(key)) {
      throw new MergeConflictError(`card ${key} is defined twice in the ${scope} set`, { ids: [card.id] });
    }
    cardKeys.add(key);

    for (const printing of card.printings) {
      const owner = printingOwners.get(printing.id);
      if (owner !== undefined) {
        throw new MergeConflictError(
          `printing ${printing.id} is declared by both ${owner} and ${key} in the ${scope} set`,
          { ids: [printing.id] }
        );
      }
      printingOwners.set(printing.id, key);

      const codeOwner = codeOwners.get(printing.code);
      if (codeOwner !== undefined && codeOwner !== key) {
        throw new MergeConflictError(
          `printing code ${printing.code} belongs to both ${codeOwner} and ${key} in the ${scope} set`,
          { ids: [printing.id] }
        );
      }
      codeOwners.set(printing.code, key);
    }
  }
  return codeOwners;
}

function groupedPrintings(cards: ReadonlyArray<Card>): GroupedPrinting[] {
  return cards.flatMap((card) => card.printings.map((printing) => ({ group: card.group, printing })));
}

function buildPrimary(input: MergeInput, groups: ReadonlySet<string>): Card[] {
  const drafts = new Map<string, DraftCard>();
  for (const [key, draft] of input.source.cards) drafts.set(key, cloneDraft(draft));

  for (const entry of entriesOfKind(input.primary, 'card')) {
    requireGroup(groups, entry, input.primary.path);
    const key = draftKey(entry.group, entry.id);
    const existing = drafts.get(key);
    if (existing) {
      amendDraft(existing, entry, input.primary.path);
    } else {
      drafts.set(key, createDraft(entry, input.primary.path));
    }
  }

  const expanded = Array.from(drafts.values(), expandCard);
  return applyRemaps(expanded, entriesOfKind(input.primary, 'remap'), input.primary.path);
}

function buildLocalCards(local: OverrideFile, primary: ReadonlyMap<string, Card>, groups: ReadonlySet<string>): Card[] {
  const drafts = new Map<string, DraftCard>();

  for (const entry of entriesOfKind(local, 'card')) {
    requireGroup(groups, entry, local.path);
    const key = draftKey(entry.group, entry.id);
    const existing = drafts.get(key);
    if (existing) {
      amendDraft(existing, entry, local.path);
      continue;
    }

    const base = primary.get(key);
    if (!base) {
      drafts.set(key, createDraft(entry, local.path));
      continue;
    }

    // A local entry for a primary card only contributes printings.
    if (entry.title !== undefined && entry.title !== base.title) {
      throw new MergeConflictError(`local card ${key} cannot change the title of the primary card`, {
        ids: [entry.id],
      });
    }
    if (entry.shape !== undefined && !sameShape(entry.shape, shapeOf(base))) {
      throw new MergeConflictError(`local card ${key} cannot change the faces or variants of the primary card`, {
        ids: [entry.id],
      });
    }
    if (entry.printings.length === 0) {
      throw new LoadError(`local card ${key} in ${local.path} declares no printings`, { ids: [entry.id] });
    }
    const draft: DraftCard = {
      id: base.id,
      group: base.group,
      title: base.title,
      strippedTitle: base.strippedTitle,
      shape: shapeOf(base),
      printings: [],
      origin: 'override',
      amendments: 0,
    };
    addPrintings(draft, entry);
    drafts.set(key, draft);
  }

  return Array.from(drafts.values(), expandCard);
}

/**
 * Runs every merge pass and returns the primary manifest and the local overlay, both unsorted.
 */
export function mergeOverrides(input: MergeInput): MergeResult {
  const groups = new Set(input.source.collections.map((collection) => collection.group));
  const primaryRemaps = entriesOfKind(input.primary, 'remap');

  const primaryCards = buildPrimary(input, groups);
  const primaryCodes = assertUnique(primaryCards, 'primary');

  const primary: Manifest = {
    version: MANIFEST_VERSION,
    collections: input.source.collections,
    cards: primaryCards,
    inserts: input.source.inserts,
    remaps: primaryRemaps.map((remap): Remap => ({ from: remap.from, to: remap.to })),
    localImages: [],
  };

  const local = input.local;
  if (local && entriesOfKind(local, 'collection').length > 0) {
    throw new LoadError(`local override file ${local.path} cannot declare [[collection]] tables`, {
      ids: [local.path],
    });
  }

  const primaryByKey = new Map(primaryCards.map((card) => [draftKey(card.group, card.id), card]));
  const localRemaps = local ? entriesOfKind(local, 'remap') : [];
  let overlayCards: Card[] = [];
  if (local) {
    overlayCards = applyRemaps(buildLocalCards(local, primaryByKey, groups), localRemaps, local.path);
    assertUnique(overlayCards, 'local');
    for (const card of overlayCards) {
      for (const printing of card.printings) {
        const owner = primaryCodes.get(printing.code);
        if (owner !== undefined) {
          throw new MergeConflictError(
            `local printing ${printing.id} of ${draftKey(card.group, card.id)} collides with primary card ${owner}`,
            { ids: [printing.id] }
          );
        }
      }
    }
  }

  const pool = [...groupedPrintings(primaryCards), ...groupedPrintings(overlayCards)];
  const localImages = [
    ...resolveLocalImages(
      entriesOfKind(input.primary, 'local-image'),
      entriesOfKind(input.primary, 'local-image-root')[0],
      pool
    ),
    ...(local
      ? resolveLocalImages(entriesOfKind(local, 'local-image'), entriesOfKind(local, 'local-image-root')[0], pool)
      : []),
  ];

  const hasOverlay = overlayCards.length > 0 || localRemaps.length > 0 || localImages.length > 0;
  const overlay: Manifest | null = hasOverlay
    ? {
        version: MANIFEST_VERSION,
        collections: [],
        cards: overlayCards,
        inserts: [],
        remaps: localRemaps.map((remap): Remap => ({ from: remap.from, to: remap.to })),
        localImages,
      }
    : null;

  logInfo(
    TAG,
    `Merged ${primaryCards.length} cards (${primaryRemaps.length} remaps)` +
      (overlay ? `; overlay has ${overlayCards.length} cards and ${localImages.length} local images` : '')
  );

  return { primary, overlay };
}
