import type { ObservationSeverity, ValidationEvent, ValidationObserver } from 'sigwarden'

/**
 * Observer that keeps every event for later assertions.
 * @public
 */
export class RecordingObserver implements ValidationObserver {
  readonly events: ValidationEvent[] = []

  emit(event: ValidationEvent): void {
    this.events.push(event)
  }

  /** Messages of the events with the given severity, in emission order. */
  messages(severity: ObservationSeverity): string[] {
    return this.events.filter((event) => event.severity === severity).map((event) => event.message)
  }
}
