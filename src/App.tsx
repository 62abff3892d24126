import { RouletteProvider } from './contexts/RouletteContext';
import { Home } from './pages/Home';

function App() {
  return (
    <RouletteProvider>
      <Home />
    </RouletteProvider>
  );
}

export default App;
