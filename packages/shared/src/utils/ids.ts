let lastEntryId = 0;

/**
 * Next queue entry id. Ids only ever grow within a process, so a removal by id
 * can never hit an entry created after the id was handed out.
 */
export function nextEntryId(): number {
  lastEntryId += 1;
  return lastEntryId;
}
