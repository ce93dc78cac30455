import { gql } from 'graphql-tag';

/**
 * Admin API extensions — record creation and lookup for masters,
 * properties and sub-entities.
 */
export const adminApiExtensions = gql`
    type Master implements Node {
        id: ID!
        createdAt: DateTime!
        updatedAt: DateTime!
        name: String!
    }

    type Property implements Node {
        id: ID!
        createdAt: DateTime!
        updatedAt: DateTime!
        name: String!
        masterId: ID!
        subEntityId: ID
    }

    type SubEntity implements Node {
        id: ID!
        createdAt: DateTime!
        updatedAt: DateTime!
        name: String!
        masterId: ID
    }

    input CreateMasterInput {
        name: String!
    }

    input CreatePropertyInput {
        name: String!
        masterId: ID!
    }

    input CreateSubEntityInput {
        name: String!
        masterId: ID
    }

    extend type Query {
        master(id: ID!): Master
        property(id: ID!): Property
        properties(masterId: ID!): [Property!]!
        subEntity(id: ID!): SubEntity
    }

    extend type Mutation {
        createMaster(input: CreateMasterInput!): Master!
        createProperty(input: CreatePropertyInput!): Property!
        """
        Creates a SubEntity and links every unlinked Property of its Master to it.
        """
        createSubEntity(input: CreateSubEntityInput!): SubEntity!
    }
`;
