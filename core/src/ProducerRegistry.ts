import { validatePrincipal } from './utils.js'
import type { Principal, ProducerRegistry } from './types.js'

/**
 * Set-backed ProducerRegistry for hosts that keep membership in process.
 */
export class InMemoryProducerRegistry implements ProducerRegistry {
  private producers: Set<Principal>

  constructor(producers: Iterable<Principal> = []) {
    this.producers = new Set(producers)
  }

  register(producer: Principal): void {
    validatePrincipal(producer, 'producer')
    this.producers.add(producer)
  }

  deregister(producer: Principal): boolean {
    return this.producers.delete(producer)
  }

  isRegistered(principal: Principal): boolean {
    return this.producers.has(principal)
  }

  list(): Principal[] {
    return Array.from(this.producers).sort()
  }
}
