/**
 * Service Registry
 *
 * Binds each capability contract to one provider for the active platform.
 * Bindings are written during bootstrap, validated, then frozen; after that
 * the registry is read-only and needs no coordination between requests.
 * Freezing also builds every singleton, so a provider that cannot be
 * constructed fails startup rather than a request.
 */

import { createSubsystemLogger, errorMessage } from '../../logging/subsystem.js';
import {
  CapabilityUnavailableError,
  DuplicateRegistrationError,
  ProviderInitializationError,
  RegistryFrozenError,
} from '../errors.js';
import {
  CAPABILITY_CONTRACTS,
  type CapabilityContract,
  type CapabilityContracts,
  type PlatformIdentity,
} from '../types/index.js';

const log = createSubsystemLogger('device/registry');

export type Lifecycle = 'singleton' | 'transient';

export type ProviderFactory<K extends CapabilityContract> = () => CapabilityContracts[K];

export interface RegistrationOptions {
  /** Defaults to `singleton` */
  lifecycle?: Lifecycle;
  /** Replace an existing binding instead of failing */
  override?: boolean;
}

export type LookupResult<K extends CapabilityContract> =
  | { available: true; contract: K; provider: CapabilityContracts[K] }
  | { available: false; contract: K; reason: string };

interface Binding<K extends CapabilityContract> {
  factory: ProviderFactory<K>;
  lifecycle: Lifecycle;
  instance?: CapabilityContracts[K];
}

interface BindingSlot<K extends CapabilityContract> {
  binding: Binding<K> | undefined;
}

type BindingTable = { [K in CapabilityContract]: BindingSlot<K> };

function emptyBindingTable(): BindingTable {
  return {
    health: { binding: undefined },
    extras: { binding: undefined },
    camera: { binding: undefined },
    screenshot: { binding: undefined },
    player: { binding: undefined },
    actions: { binding: undefined },
    tracker: { binding: undefined },
  };
}

export class ServiceRegistry {
  private readonly bindings: BindingTable = emptyBindingTable();
  private frozen = false;

  constructor(readonly platform: PlatformIdentity) {}

  /**
   * Registers a factory for a contract. Singletons are built on first resolve
   * or at freeze, whichever comes first; transients are built on every resolve.
   */
  register<K extends CapabilityContract>(
    contract: K,
    factory: ProviderFactory<K>,
    options: RegistrationOptions = {},
  ): this {
    this.assertWritable(contract, options.override ?? false);
    const binding: Binding<K> = { factory, lifecycle: options.lifecycle ?? 'singleton' };
    this.slot(contract).binding = binding;

    log.debug('Registered capability', { contract, lifecycle: binding.lifecycle, platform: this.platform });
    return this;
  }

  /**
   * Registers an already constructed provider as a singleton
   */
  registerInstance<K extends CapabilityContract>(
    contract: K,
    instance: CapabilityContracts[K],
    options: Pick<RegistrationOptions, 'override'> = {},
  ): this {
    this.assertWritable(contract, options.override ?? false);
    const binding: Binding<K> = { factory: () => instance, lifecycle: 'singleton', instance };
    this.slot(contract).binding = binding;

    log.debug('Registered capability instance', { contract, platform: this.platform });
    return this;
  }

  /**
   * @throws CapabilityUnavailableError when the contract has no binding
   */
  resolve<K extends CapabilityContract>(contract: K): CapabilityContracts[K] {
    const binding = this.slot(contract).binding;
    if (!binding) {
      throw new CapabilityUnavailableError(contract, this.platform);
    }

    if (binding.lifecycle === 'transient') {
      return binding.factory();
    }

    if (binding.instance === undefined) {
      binding.instance = binding.factory();
    }
    return binding.instance;
  }

  /**
   * Non-throwing resolve for optional capabilities
   */
  lookup<K extends CapabilityContract>(contract: K): LookupResult<K> {
    if (!this.has(contract)) {
      return {
        available: false,
        contract,
        reason: `Capability "${contract}" is not available on platform "${this.platform}"`,
      };
    }
    return { available: true, contract, provider: this.resolve(contract) };
  }

  has(contract: CapabilityContract): boolean {
    return this.slot(contract).binding !== undefined;
  }

  contracts(): CapabilityContract[] {
    return CAPABILITY_CONTRACTS.filter(contract => this.has(contract));
  }

  /**
   * Returns the required contracts that have no binding
   */
  validate(required: readonly CapabilityContract[]): CapabilityContract[] {
    return required.filter(contract => !this.has(contract));
  }

  /**
   * Builds every singleton, then makes the registry read-only.
   *
   * @throws ProviderInitializationError when a singleton factory throws; the
   * registry stays writable in that case
   */
  freeze(): void {
    if (this.frozen) {
      return;
    }
    for (const contract of this.contracts()) {
      this.instantiate(contract);
    }
    this.frozen = true;
    log.info('Service registry frozen', { platform: this.platform, contracts: this.contracts() });
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  private slot<K extends CapabilityContract>(contract: K): BindingSlot<K> {
    return this.bindings[contract];
  }

  private instantiate<K extends CapabilityContract>(contract: K): void {
    const binding = this.slot(contract).binding;
    if (!binding || binding.lifecycle !== 'singleton' || binding.instance !== undefined) {
      return;
    }
    try {
      binding.instance = binding.factory();
    } catch (error) {
      log.error('Provider construction failed', { contract, platform: this.platform, error: errorMessage(error) });
      throw new ProviderInitializationError(contract, this.platform, error);
    }
  }

  private assertWritable(contract: CapabilityContract, override: boolean): void {
    if (this.frozen) {
      throw new RegistryFrozenError(contract);
    }
    if (this.has(contract) && !override) {
      throw new DuplicateRegistrationError(contract);
    }
  }
}
