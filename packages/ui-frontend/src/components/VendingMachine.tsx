/**
 * Cupcake Vending Machine
 *
 * One button: buy a cupcake with the injected wallet, then show the balance.
 */

import type { DeploymentArtifacts } from '@cupcake-vending/contracts/schemas';
import { useVendingMachine } from '../hooks/useVendingMachine.js';
import { formatAddress } from '../services/wallet.js';
import type { InjectedProvider } from '../types/ethereum.js';

interface VendingMachineProps {
  provider?: InjectedProvider;
  loadDeployment?: () => Promise<DeploymentArtifacts>;
}

export function VendingMachine({ provider, loadDeployment }: VendingMachineProps) {
  const machine = useVendingMachine({ provider, loadDeployment });

  if (!provider) {
    return (
      <section className="vending-machine">
        <h1>Cupcake Vending Machine</h1>
        <p role="alert">Install a browser wallet such as MetaMask to buy cupcakes.</p>
      </section>
    );
  }

  if (machine.isLoadingDeployment) {
    return (
      <section className="vending-machine">
        <p>Loading vending machine...</p>
      </section>
    );
  }

  if (machine.deploymentError || !machine.deployment) {
    return (
      <section className="vending-machine">
        <h1>Cupcake Vending Machine</h1>
        <p role="alert">{machine.deploymentError?.message ?? 'Vending machine not deployed'}</p>
      </section>
    );
  }

  const balance = machine.balance === undefined ? '-' : machine.balance.toString();

  return (
    <section className="vending-machine">
      <h1>Cupcake Vending Machine</h1>
      <p>{`Cupcake balance: ${balance}`}</p>
      {machine.account && <p>{`Connected: ${formatAddress(machine.account)}`}</p>}
      <button type="button" onClick={machine.getCupcake} disabled={machine.isPending}>
        {machine.isPending ? 'Dispensing...' : 'Get Cupcake'}
      </button>
    </section>
  );
}
