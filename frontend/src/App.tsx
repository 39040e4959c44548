import { useQuery } from "@tanstack/react-query";
import { getHello } from "./services/api/hello";
import { toUiError } from "./services/api/error-ui";
import { queryKeys } from "./services/query-keys";

function App() {
  const helloQuery = useQuery({
    queryKey: queryKeys.hello,
    queryFn: getHello,
  });

  if (helloQuery.isPending) {
    return <p className="inline-note">Contacting backend...</p>;
  }

  if (helloQuery.isError) {
    const uiError = toUiError(helloQuery.error, "Unable to load greeting.");

    return (
      <div className="inline-error-block">
        <p className="error-note">{uiError.message}</p>
        {uiError.retryable ? (
          <button type="button" onClick={() => void helloQuery.refetch()}>
            retry
          </button>
        ) : null}
      </div>
    );
  }

  return <h1>{helloQuery.data}</h1>;
}

export default App;
