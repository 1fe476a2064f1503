import { Toaster } from 'react-hot-toast';
import { VendingMachine } from './components/VendingMachine.js';

export default function App() {
  return (
    <>
      <VendingMachine provider={window.ethereum} />
      <Toaster position="bottom-center" />
    </>
  );
}
