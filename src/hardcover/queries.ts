// ---------------------------------------------------------------------------
// GraphQL documents sent to Hardcover.
// ---------------------------------------------------------------------------

import type { PropertyPath } from "./extraction.js";

/** Fields requested for every book the crawler may store. */
const BOOK_FIELDS = `
  id
  title
  slug
  rating
  ratings_count
  users_count
  cached_contributors
  cached_tags
  contributions(where: { contributable_type: { _eq: "Book" } }) {
    author { id name slug }
  }
  image { url }
  default_physical_edition { isbn_13 isbn_10 }
  default_ebook_edition { isbn_13 isbn_10 }
`;

/** Exact title match. Wildcard (`_ilike '%…%'`) queries are throttled hard upstream. */
export const BOOK_BY_TITLE = `
  query BookByTitle($title: String!) {
    books(
      where: { title: { _eq: $title } }
      limit: 5
      order_by: { users_count: desc }
    ) {
      ${BOOK_FIELDS}
    }
  }
`;

export const BOOK_BY_ISBN = `
  query BookByIsbn($isbns: [String!]!) {
    books(
      where: {
        _or: [
          { default_physical_edition: { isbn_13: { _in: $isbns } } },
          { default_physical_edition: { isbn_10: { _in: $isbns } } },
          { default_ebook_edition: { isbn_13: { _in: $isbns } } },
          { default_ebook_edition: { isbn_10: { _in: $isbns } } }
        ]
      }
      limit: 5
      order_by: { users_count: desc }
    ) {
      ${BOOK_FIELDS}
    }
  }
`;

/** Lists holding the book, each with up to `itemLimit` other books. */
export const LISTS_WITH_BOOK = `
  query ListsWithBook($bookId: Int!, $listLimit: Int!, $itemLimit: Int!) {
    list_books(
      where: { book_id: { _eq: $bookId } }
      limit: $listLimit
      order_by: { created_at: desc }
    ) {
      list {
        id
        name
        slug
        user { name username }
        list_books(where: { book_id: { _neq: $bookId } }, limit: $itemLimit) {
          book { ${BOOK_FIELDS} }
        }
      }
    }
  }
`;

export const SEARCH_BY_ISBN = `
  query SearchByIsbn($query: String!, $perPage: Int!, $page: Int!) {
    search(query: $query, query_type: "isbns", per_page: $perPage, page: $page) {
      results
    }
  }
`;

export const ADD_BOOK_TO_LIST = `
  mutation AddBookToList($bookId: Int!, $listId: Int!) {
    insert_list_book(object: { book_id: $bookId, list_id: $listId }) {
      id
    }
  }
`;

// ── Want-to-read query variants ─────────────────────────────────────────────

/** One shape of a query plus where its rows live in `data`. */
export interface QueryVariant {
  name: string;
  document: string;
  rowsPath: PropertyPath;
}

const WANT_BOOK_FIELDS = `
  status_id
  book {
    id
    title
    slug
    rating
    users_count
    cached_contributors
    image { url }
    default_physical_edition { isbn_13 isbn_10 }
    default_ebook_edition { isbn_13 isbn_10 }
  }
`;

/**
 * The `me` relation has been published under both names; try them in order
 * and keep the first that answers with rows.
 */
export const WANT_TO_READ_VARIANTS: readonly QueryVariant[] = [
  {
    name: "user_book",
    document: `
      query WantToRead {
        me {
          user_book(where: { status_id: { _eq: 1 } }, order_by: { date_added: desc }) {
            ${WANT_BOOK_FIELDS}
          }
        }
      }
    `,
    rowsPath: ["me", "user_book"],
  },
  {
    name: "user_books",
    document: `
      query WantToRead {
        me {
          user_books(where: { status_id: { _eq: 1 } }, order_by: { date_added: desc }) {
            ${WANT_BOOK_FIELDS}
          }
        }
      }
    `,
    rowsPath: ["me", "user_books"],
  },
];
