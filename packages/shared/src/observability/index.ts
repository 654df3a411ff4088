export { JsonlEventWriter, MemoryEventWriter, isEventOfType } from './jsonl-event-writer';
