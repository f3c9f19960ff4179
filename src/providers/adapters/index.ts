export { adaptAggregatorResults } from "./aggregatorResults";
export { truncateContent } from "./common";
export { adaptFlatSubmissions } from "./flatSubmissions";
export { adaptGenericResults } from "./genericResults";
export { adaptRedditListing } from "./redditListing";
